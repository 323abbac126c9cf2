import { InvalidParameterError, UnsupportedFileTypeError } from '../middleware/error.js';
import { FILAMENT_DENSITIES, FILAMENT_TYPES, findFilament, type FilamentTable } from '../filaments/filament.table.js';
import type { RawSliceFields } from '../types.js';
import type { SliceRequest, UploadedModel } from './models.js';

export const ALLOWED_EXTENSIONS = ['.stl', '.3mf'];

// g/cm³; metal-filled filaments stay well below this
export const MAX_FILAMENT_DENSITY = 20;

export const SLICE_DEFAULTS = {
	layerHeight: 0.2,
	infillDensity: 15,
	wallCount: 2,
	filamentType: 'PLA',
} as const;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function present(raw: string | undefined): string | undefined {
	const trimmed = raw?.trim();
	return trimmed ? trimmed : undefined;
}

function parseNumber(field: string, raw: string): number {
	if (!NUMBER_PATTERN.test(raw)) {
		throw new InvalidParameterError(field, `${field} must be a number, got "${raw}"`);
	}
	return Number(raw);
}

function parseInteger(field: string, raw: string): number {
	const value = parseNumber(field, raw);
	if (!Number.isInteger(value)) {
		throw new InvalidParameterError(field, `${field} must be an integer, got ${value}`);
	}
	return value;
}

function checkRange(field: string, value: number, min: number, max: number, unit = ''): number {
	if (value < min || value > max) {
		throw new InvalidParameterError(field, `${field} must be between ${min} and ${max}${unit}, got ${value}`);
	}
	return value;
}

/**
 * Lowercased model suffix, matched on the end of the name so that a bare ".stl" counts.
 */
export function modelExtension(filename: string): string | undefined {
	const lower = filename.toLowerCase();
	return ALLOWED_EXTENSIONS.find(ext => lower.endsWith(ext));
}

export function hasAllowedExtension(filename: string): boolean {
	return modelExtension(filename) !== undefined;
}

/**
 * Turns the raw upload and form fields into a SliceRequest, or throws the first
 * problem found. Checks run in a fixed order: file, extension, layer height,
 * infill, walls, density override, filament type.
 */
export function validateSliceRequest(
	file: UploadedModel | undefined,
	fields: RawSliceFields,
	table: FilamentTable = FILAMENT_DENSITIES,
): SliceRequest {
	if (!file) {
		throw new InvalidParameterError('file', 'file is required');
	}
	if (!hasAllowedExtension(file.name)) {
		throw new UnsupportedFileTypeError(file.name);
	}

	const layerHeightRaw = present(fields.layer_height);
	const layerHeight =
		layerHeightRaw === undefined ? SLICE_DEFAULTS.layerHeight : checkRange('layer_height', parseNumber('layer_height', layerHeightRaw), 0.1, 0.4, ' mm');

	const infillRaw = present(fields.infill_density);
	const infillDensity =
		infillRaw === undefined ? SLICE_DEFAULTS.infillDensity : checkRange('infill_density', parseInteger('infill_density', infillRaw), 0, 100);

	const wallRaw = present(fields.wall_count);
	const wallCount = wallRaw === undefined ? SLICE_DEFAULTS.wallCount : checkRange('wall_count', parseInteger('wall_count', wallRaw), 1, 10);

	const densityRaw = present(fields.filament_density);
	let filamentDensityOverride: number | undefined;
	if (densityRaw !== undefined) {
		filamentDensityOverride = parseNumber('filament_density', densityRaw);
		if (filamentDensityOverride <= 0) {
			throw new InvalidParameterError('filament_density', `filament_density must be greater than 0, got ${filamentDensityOverride}`);
		}
		if (!Number.isFinite(filamentDensityOverride) || filamentDensityOverride > MAX_FILAMENT_DENSITY) {
			throw new InvalidParameterError(
				'filament_density',
				`filament_density must be at most ${MAX_FILAMENT_DENSITY} g/cm³, got ${filamentDensityOverride}`,
			);
		}
	}

	const filamentType = present(fields.filament_type) ?? SLICE_DEFAULTS.filamentType;
	if (filamentDensityOverride === undefined && !findFilament(filamentType, table)) {
		throw new InvalidParameterError('filament_type', `filament_type must be one of ${FILAMENT_TYPES.join(', ')}, got ${filamentType}`);
	}

	return {
		sourceFile: file,
		layerHeight,
		infillDensity,
		wallCount,
		filamentType,
		...(filamentDensityOverride !== undefined && { filamentDensityOverride }),
	};
}
