import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import type { AppConfig } from '../src/config.js';
import type { SliceRequest } from '../src/slicing/models.js';

export const FAKE_SLICER = fileURLToPath(new URL('./fixtures/fake-slicer.mjs', import.meta.url));

export interface ScratchDirs {
	root: string;
	uploadDir: string;
	outputDir: string;
}

export async function makeScratchDirs(): Promise<ScratchDirs> {
	const root = await fs.mkdtemp(path.join(os.tmpdir(), 'superslice-test-'));
	const uploadDir = path.join(root, 'uploads');
	const outputDir = path.join(root, 'output');
	await fs.mkdir(uploadDir);
	await fs.mkdir(outputDir);
	return { root, uploadDir, outputDir };
}

export async function removeScratchDirs(dirs: ScratchDirs): Promise<void> {
	await fs.rm(dirs.root, { recursive: true, force: true });
}

export async function listScratchFiles(dirs: ScratchDirs): Promise<string[]> {
	return [...(await fs.readdir(dirs.uploadDir)), ...(await fs.readdir(dirs.outputDir))];
}

/** Runs the fake slicer script through the current Node binary. */
export function testConfig(dirs: ScratchDirs, overrides: Partial<AppConfig> = {}): AppConfig {
	return {
		port: 0,
		uploadDir: dirs.uploadDir,
		outputDir: dirs.outputDir,
		slicerPath: process.execPath,
		slicerArgs: [FAKE_SLICER],
		timeoutMs: 15_000,
		maxFileSize: 1_000_000,
		filamentDiameterMm: 1.75,
		reportFormat: 'prusaslicer',
		corsOrigins: ['*'],
		...overrides,
	};
}

export function sliceRequest(model: string, overrides: Partial<SliceRequest> = {}): SliceRequest {
	return {
		sourceFile: { name: 'cube.stl', data: Buffer.from(model) },
		layerHeight: 0.2,
		infillDensity: 15,
		wallCount: 2,
		filamentType: 'PLA',
		...overrides,
	};
}

export function isRunning(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch {
		return false;
	}
}
