import express, { type Express } from 'express';
import cors from 'cors';
import { API_TITLE, API_VERSION, type AppConfig } from './config.js';
import { FILAMENT_DENSITIES, type FilamentTable } from './filaments/filament.table.js';
import { createFilamentRouter } from './filaments/route.js';
import { createSlicingRouter } from './slicing/route.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import type { ServiceStatus } from './types.js';

export function createApp(config: AppConfig, table: FilamentTable = FILAMENT_DENSITIES): Express {
	const app = express();
	app.disable('x-powered-by');

	app.use(
		cors({
			// '*' reflects the caller's origin so credentialed requests still work
			origin: config.corsOrigins.includes('*') ? true : config.corsOrigins,
			methods: ['GET', 'POST', 'OPTIONS'],
			credentials: true,
		}),
	);

	app.get('/', (req, res) => {
		const body: ServiceStatus = { service: API_TITLE, status: 'running', version: API_VERSION };
		res.json(body);
	});

	app.use('/filament-types', createFilamentRouter(table));
	app.use('/slice', createSlicingRouter(config, table));

	app.use(notFoundHandler);
	app.use(errorHandler);

	return app;
}
