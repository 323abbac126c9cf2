import { unit } from 'mathjs';
import { UnparsableOutputError } from '../middleware/error.js';
import type { ParsedReport } from './models.js';

type LengthUnit = 'mm' | 'm';

interface LengthPattern {
	pattern: RegExp;
	unit: LengthUnit;
}

export interface ReportFormat {
	name: string;
	/** First capture group holds a duration string. */
	time: readonly RegExp[];
	/** First capture group holds one or more comma-separated lengths. */
	length: readonly LengthPattern[];
}

const FILAMENT_LENGTH: readonly LengthPattern[] = [
	{ pattern: /^;\s*filament used \[mm\]\s*=\s*(.+)$/m, unit: 'mm' },
	{ pattern: /^;\s*filament used \[m\]\s*=\s*(.+)$/m, unit: 'm' },
];

// Slicer console phrasing is not a stable contract, so each format is pinned to the
// comment lines a known slicer release writes into its G-code.
export const REPORT_FORMATS = [
	{
		name: 'prusaslicer',
		time: [/^;\s*estimated printing time \(normal mode\)\s*=\s*(.+)$/m],
		length: FILAMENT_LENGTH,
	},
	{
		name: 'orcaslicer',
		time: [/^;\s*model printing time:.*;\s*total estimated time:\s*(.+)$/m, /^;\s*total estimated time:\s*(.+)$/m],
		length: FILAMENT_LENGTH,
	},
] as const satisfies readonly ReportFormat[];

export type ReportFormatName = (typeof REPORT_FORMATS)[number]['name'];

const SECONDS_PER_UNIT: Record<string, number> = { d: 86_400, h: 3_600, m: 60, s: 1 };

/**
 * Reads "1d 2h 3m 4s" (any subset of units, each at most once, largest first) or a bare
 * decimal number of minutes. Returns minutes, or undefined when the text is neither.
 */
export function parseDuration(text: string): number | undefined {
	const trimmed = text.trim();
	if (/^\d+(\.\d+)?$/.test(trimmed)) {
		return Number(trimmed);
	}

	const tokens = trimmed.split(/\s+/);
	let seconds = 0;
	let previousUnit = Infinity;
	for (const token of tokens) {
		const match = token.match(/^(\d+)([dhms])$/);
		const unitSeconds = match?.[2] ? SECONDS_PER_UNIT[match[2]] : undefined;
		if (!match?.[1] || unitSeconds === undefined || unitSeconds >= previousUnit) return undefined;
		previousUnit = unitSeconds;
		seconds += parseInt(match[1], 10) * unitSeconds;
	}
	return seconds / 60;
}

function parseLengths(text: string, lengthUnit: LengthUnit): number | undefined {
	const parts = text.split(',').map(part => part.trim());
	let total = 0;
	for (const part of parts) {
		if (!/^\d+(\.\d+)?$/.test(part)) return undefined;
		total += Number(part);
	}
	return lengthUnit === 'mm' ? total : unit(total, lengthUnit).toNumber('mm');
}

export function findReportFormat(name: ReportFormatName): ReportFormat {
	const format = REPORT_FORMATS.find(f => f.name === name);
	if (!format) {
		throw new Error(`Unknown report format: ${name}`);
	}
	return format;
}

/**
 * Extracts print time and filament length from slicer output. Fails rather than
 * guessing when a marker is missing or its value does not parse.
 */
export function parseReport(text: string, formatName: ReportFormatName = 'prusaslicer'): ParsedReport {
	const format = findReportFormat(formatName);

	const timeText = format.time.map(pattern => text.match(pattern)?.[1]).find(value => value !== undefined);
	if (timeText === undefined) {
		throw new UnparsableOutputError('Could not find estimated print time in slicer output');
	}
	const printTimeMinutes = parseDuration(timeText);
	if (printTimeMinutes === undefined) {
		throw new UnparsableOutputError(`Unrecognised print time format: "${timeText.trim()}"`);
	}

	for (const { pattern, unit: lengthUnit } of format.length) {
		const lengthText = text.match(pattern)?.[1];
		if (lengthText === undefined) continue;

		const filamentLengthMm = parseLengths(lengthText, lengthUnit);
		if (filamentLengthMm === undefined) {
			throw new UnparsableOutputError(`Unrecognised filament length format: "${lengthText.trim()}"`);
		}
		return { printTimeMinutes, filamentLengthMm };
	}

	throw new UnparsableOutputError('Could not find filament usage in slicer output');
}
