import { round } from 'mathjs';
import type { SliceResponse } from '../types.js';
import type { FilamentUsage, ParsedReport, SliceRequest } from './models.js';

/**
 * 30.03 → "30m 2s", 90 → "1h 30m 0s". Hours are left out when zero; minutes and
 * seconds are always shown.
 */
export function formatPrintTime(minutes: number): string {
	const totalSeconds = Math.max(0, Math.round(minutes * 60));
	const hours = Math.floor(totalSeconds / 3600);
	const mins = Math.floor((totalSeconds % 3600) / 60);
	const secs = totalSeconds % 60;

	return hours > 0 ? `${hours}h ${mins}m ${secs}s` : `${mins}m ${secs}s`;
}

export function assembleSliceResponse(request: SliceRequest, report: ParsedReport, usage: FilamentUsage): SliceResponse {
	return {
		success: true,
		print_time_minutes: round(report.printTimeMinutes, 2),
		print_time_formatted: formatPrintTime(report.printTimeMinutes),
		filament_length_mm: round(report.filamentLengthMm, 2),
		filament_volume_cm3: round(usage.volumeCm3, 2),
		filament_weight_g: round(usage.weightG, 2),
		filament_type: request.filamentType,
		layer_height: request.layerHeight,
		infill_density: request.infillDensity,
		wall_count: request.wallCount,
	};
}
