import multer from 'multer';
import type { RequestHandler } from 'express';
import { AppError } from './error.js';

const storage = multer.memoryStorage();

/**
 * Single `file` field held in memory, so nothing touches the scratch directories
 * until the request has been validated.
 */
export function uploadModel(maxFileSize: number): RequestHandler {
	const upload = multer({
		storage,
		limits: { fileSize: maxFileSize, files: 1 },
	}).single('file');

	return (req, res, next) => {
		upload(req, res, (err: unknown) => {
			if (!err) return next();

			if (err instanceof multer.MulterError) {
				if (err.code === 'LIMIT_FILE_SIZE') {
					return next(new AppError(413, `File exceeds the maximum upload size of ${maxFileSize} bytes`, err.message));
				}
				return next(new AppError(400, `Invalid upload: ${err.message}`, err.code));
			}
			next(err instanceof Error ? new AppError(400, 'Invalid multipart request', err.message) : err);
		});
	};
}
