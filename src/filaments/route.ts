import { Router } from 'express';
import { FILAMENT_DENSITIES, listFilaments, type FilamentTable } from './filament.table.js';
import type { FilamentTypesResponse } from '../types.js';

export function createFilamentRouter(table: FilamentTable = FILAMENT_DENSITIES): Router {
	const router: Router = Router();

	router.get('/', (req, res) => {
		const body: FilamentTypesResponse = {
			filament_types: Object.fromEntries(listFilaments(table).map((entry): [string, number] => [entry.name, entry.densityGramsPerCm3])),
		};
		res.status(200).json(body);
	});

	return router;
}
