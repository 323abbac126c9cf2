import type { NextFunction, Response, Request } from 'express';
import type { ErrorResponse } from '../types.js';

export class AppError extends Error {
	status: number = 500;
	causeMessage?: string;

	constructor(status: number, message: string, causeMessage?: string) {
		super(message);
		this.name = new.target.name;
		this.status = status;
		this.causeMessage = causeMessage;
	}
}

export class InvalidParameterError extends AppError {
	field: string;

	constructor(field: string, message: string) {
		super(400, message);
		this.field = field;
	}
}

export class UnsupportedFileTypeError extends AppError {
	constructor(filename: string) {
		super(400, 'Only STL and 3MF files are supported', `Rejected upload: ${filename}`);
	}
}

export class SliceTimeoutError extends AppError {
	constructor(timeoutMs: number) {
		super(408, 'Slicing timeout - model too complex', `Slicer killed after ${timeoutMs}ms`);
	}
}

export class SliceExecutionError extends AppError {
	constructor(diagnostics: string, causeMessage?: string) {
		super(500, `Slicing failed: ${diagnostics}`, causeMessage);
	}
}

export class UnparsableOutputError extends AppError {
	constructor(message: string) {
		super(500, message);
	}
}

export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
	next(new AppError(404, 'Not Found', `No route for ${req.method} ${req.originalUrl}`));
}

/* eslint-disable @typescript-eslint/no-unused-vars */
export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
	const appError = err instanceof AppError ? err : new AppError(500, 'Internal server error', err.message);

	console.error(
		`[${new Date().toISOString()}] Error: ${appError.message}
    at ${req.method} ${req.originalUrl} with ${err.stack ?? 'no stack trace'}
    ${appError.causeMessage ? `Cause: ${appError.causeMessage}` : ''}`,
	);

	if (res.headersSent) {
		return;
	}

	const body: ErrorResponse = { detail: appError.message };
	res.status(appError.status).json(body);
}
