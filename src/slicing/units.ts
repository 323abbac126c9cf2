import { unit } from 'mathjs';
import { InvalidParameterError, UnparsableOutputError } from '../middleware/error.js';
import { FILAMENT_DENSITIES, findFilament, type FilamentTable } from '../filaments/filament.table.js';
import type { FilamentUsage } from './models.js';

export const DEFAULT_FILAMENT_DIAMETER_MM = 1.75;

export interface ConversionOptions {
	diameterMm?: number;
	table?: FilamentTable;
}

export function resolveDensity(filamentType: string, densityOverride: number | undefined, table: FilamentTable = FILAMENT_DENSITIES): number {
	if (densityOverride !== undefined) return densityOverride;

	const entry = findFilament(filamentType, table);
	if (!entry) {
		throw new InvalidParameterError('filament_type', `Unknown filament type: ${filamentType}`);
	}
	return entry.densityGramsPerCm3;
}

/**
 * volume = π·(d/2)²·length, reported in cm³; weight = volume × density.
 */
export function convertFilament(
	lengthMm: number,
	filamentType: string,
	densityOverride?: number,
	{ diameterMm = DEFAULT_FILAMENT_DIAMETER_MM, table = FILAMENT_DENSITIES }: ConversionOptions = {},
): FilamentUsage {
	const radiusMm = diameterMm / 2;
	const volumeMm3 = Math.PI * radiusMm * radiusMm * lengthMm;
	const outOfRange = () => new UnparsableOutputError(`Filament usage out of range for a length of ${lengthMm} mm`);
	if (!Number.isFinite(volumeMm3)) throw outOfRange();

	const volumeCm3 = unit(volumeMm3, 'mm^3').toNumber('cm^3');
	const weightG = volumeCm3 * resolveDensity(filamentType, densityOverride, table);
	if (!Number.isFinite(weightG)) throw outOfRange();

	return { volumeCm3, weightG };
}
