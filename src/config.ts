import dotenv from 'dotenv';
import path from 'path';
import { REPORT_FORMATS, type ReportFormatName } from './slicing/report.parser.js';

dotenv.config();

export const DEBUG_LOGGING = process.env.DEBUG_LOGGING === 'true';

export const API_TITLE = 'SuperSlice API';
export const API_VERSION = '1.0.0';

export interface SlicerConfig {
	slicerPath: string;
	slicerArgs: string[];
	uploadDir: string;
	outputDir: string;
	timeoutMs: number;
}

export interface AppConfig extends SlicerConfig {
	port: number;
	maxFileSize: number;
	filamentDiameterMm: number;
	reportFormat: ReportFormatName;
	corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
	const raw = env[key];
	if (raw === undefined || raw.trim() === '') return fallback;

	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0) {
		throw new Error(`${key} must be a positive number, got "${raw}"`);
	}
	return value;
}

/**
 * Splits a command-line fragment on whitespace, keeping double-quoted runs together.
 */
export function splitArgs(raw: string | undefined): string[] {
	if (!raw) return [];
	return raw.match(/(?:[^\s"]+|"[^"]*")+/g)?.map(token => token.replace(/(^")|("$)/g, '')) ?? [];
}

function readReportFormat(raw: string | undefined): ReportFormatName {
	const name = raw?.trim().toLowerCase() || 'prusaslicer';
	const format = REPORT_FORMATS.find(f => f.name === name);
	if (!format) {
		throw new Error(`REPORT_FORMAT must be one of ${REPORT_FORMATS.map(f => f.name).join(', ')}, got "${raw}"`);
	}
	return format.name;
}

export function loadConfig(env: Env = process.env): AppConfig {
	return {
		port: readNumber(env, 'PORT', 8000),
		uploadDir: path.resolve(env.UPLOAD_DIR || path.join(process.cwd(), 'uploads')),
		outputDir: path.resolve(env.OUTPUT_DIR || path.join(process.cwd(), 'output')),
		slicerPath: env.SLICER_PATH || 'prusa-slicer',
		slicerArgs: splitArgs(env.SLICER_ARGS),
		timeoutMs: readNumber(env, 'SLICE_TIMEOUT', 120) * 1000,
		maxFileSize: readNumber(env, 'MAX_FILE_SIZE', 104_857_600),
		filamentDiameterMm: readNumber(env, 'FILAMENT_DIAMETER', 1.75),
		reportFormat: readReportFormat(env.REPORT_FORMAT),
		corsOrigins: (env.CORS_ORIGINS || '*')
			.split(',')
			.map(origin => origin.trim())
			.filter(Boolean),
	};
}
