import { Router } from 'express';
import type { AppConfig } from '../config.js';
import { FILAMENT_DENSITIES, type FilamentTable } from '../filaments/filament.table.js';
import { uploadModel } from '../middleware/upload.js';
import type { RawSliceFields } from '../types.js';
import { readReportText, runSlicer } from './slicing.service.js';
import { parseReport } from './report.parser.js';
import { convertFilament } from './units.js';
import { assembleSliceResponse } from './response.js';
import { validateSliceRequest } from './validation.js';

function readFields(body: Record<string, unknown> = {}): RawSliceFields {
	const pick = (key: keyof RawSliceFields) => {
		const value = body[key];
		return typeof value === 'string' ? value : undefined;
	};

	return {
		layer_height: pick('layer_height'),
		infill_density: pick('infill_density'),
		wall_count: pick('wall_count'),
		filament_type: pick('filament_type'),
		filament_density: pick('filament_density'),
	};
}

export function createSlicingRouter(config: AppConfig, table: FilamentTable = FILAMENT_DENSITIES): Router {
	const router: Router = Router();

	// Single-upload slice route
	router.post('/', uploadModel(config.maxFileSize), async (req, res, next) => {
		try {
			const request = validateSliceRequest(req.file && { name: req.file.originalname, data: req.file.buffer }, readFields(req.body), table);

			const report = await runSlicer(request, config, async result => parseReport(await readReportText(result), config.reportFormat));

			const usage = convertFilament(report.filamentLengthMm, request.filamentType, request.filamentDensityOverride, {
				diameterMm: config.filamentDiameterMm,
				table,
			});

			res.status(200).json(assembleSliceResponse(request, report, usage));
		} catch (error) {
			next(error);
		}
	});

	return router;
}
