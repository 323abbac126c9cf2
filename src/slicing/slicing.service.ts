import { promises as fs } from 'fs';
import * as path from 'path';
import { spawn } from 'child_process';
import { randomUUID } from 'crypto';
import { SliceExecutionError, SliceTimeoutError } from '../middleware/error.js';
import { DEBUG_LOGGING, type SlicerConfig } from '../config.js';
import { modelExtension } from './validation.js';
import type { ExternalToolResult, ScratchPaths, SliceRequest } from './models.js';

export async function ensureScratchDirs(config: Pick<SlicerConfig, 'uploadDir' | 'outputDir'>): Promise<void> {
	await fs.mkdir(config.uploadDir, { recursive: true });
	await fs.mkdir(config.outputDir, { recursive: true });
}

/**
 * Scratch names come from a fresh UUID only, so concurrent requests never share a
 * path and the client's file name never reaches the filesystem.
 */
export function createScratchPaths(config: Pick<SlicerConfig, 'uploadDir' | 'outputDir'>, filename: string): ScratchPaths {
	const id = randomUUID();
	const ext = modelExtension(filename) ?? path.extname(filename).toLowerCase();
	return {
		inputPath: path.join(config.uploadDir, `${id}${ext}`),
		outputPath: path.join(config.outputDir, `${id}.gcode`),
	};
}

export function buildSlicerArgs(request: SliceRequest, paths: ScratchPaths, baseArgs: readonly string[] = []): string[] {
	return [
		...baseArgs,
		'--layer-height',
		String(request.layerHeight),
		'--perimeters',
		String(request.wallCount),
		'--fill-density',
		`${request.infillDensity}%`,
		'--export-gcode',
		'--output',
		paths.outputPath,
		paths.inputPath,
	];
}

async function exists(target: string): Promise<boolean> {
	return fs
		.access(target)
		.then(() => true)
		.catch(() => false);
}

async function removeScratchFiles(paths: ScratchPaths): Promise<void> {
	await Promise.all(
		[paths.inputPath, paths.outputPath].map(file =>
			fs.rm(file, { force: true }).catch(err => console.warn(`Failed to delete scratch file ${file}:`, err)),
		),
	);
}

/**
 * Spawns the slicer and waits for it to close. The timer sends SIGKILL and the
 * promise still waits for the close event, so a timed-out process has exited and
 * been reaped before this rejects.
 */
async function execute(command: string, args: string[], timeoutMs: number, outputPath: string): Promise<ExternalToolResult> {
	if (DEBUG_LOGGING) console.log(`Executing slicer ${command} with args:`, args);

	const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

	let stdout = '';
	let stderr = '';
	child.stdout.setEncoding('utf-8').on('data', (chunk: string) => {
		stdout += chunk;
	});
	child.stderr.setEncoding('utf-8').on('data', (chunk: string) => {
		stderr += chunk;
	});

	let timedOut = false;
	const timer = setTimeout(() => {
		timedOut = true;
		child.kill('SIGKILL');
	}, timeoutMs);

	let exitCode: number | null;
	try {
		exitCode = await new Promise<number | null>((resolve, reject) => {
			child.once('error', reject);
			child.once('close', code => resolve(code));
		});
	} catch (error) {
		throw new SliceExecutionError(
			`could not start slicer at ${command}`,
			error instanceof Error ? error.message : String(error),
		);
	} finally {
		clearTimeout(timer);
	}

	if (timedOut) {
		console.error(`Slicer exceeded ${timeoutMs}ms and was killed (pid ${child.pid})`);
		throw new SliceTimeoutError(timeoutMs);
	}

	if (exitCode !== 0) {
		console.error(`Slicer failed with exit code: ${exitCode}`);
		console.error(`Slicer stderr:`, stderr);
		const diagnostics = stderr.trim() || stdout.trim() || `exit code ${exitCode}`;
		throw new SliceExecutionError(diagnostics, `exit code ${exitCode}`);
	}

	if (DEBUG_LOGGING && stdout) console.log(`Slicer stdout:`, stdout);

	return {
		exitCode,
		stdout,
		...((await exists(outputPath)) && { generatedOutputPath: outputPath }),
	};
}

/**
 * Slicer stdout followed by the generated G-code, which carries the estimate
 * comments most slicers write.
 */
export async function readReportText(result: ExternalToolResult): Promise<string> {
	if (!result.generatedOutputPath) return result.stdout;
	const gcode = await fs.readFile(result.generatedOutputPath, 'utf-8');
	return `${result.stdout}\n${gcode}`;
}

/**
 * Writes the upload to a scratch file, runs the slicer on it and hands the result
 * to `consume` while the scratch files still exist. Both scratch files are removed
 * before this settles, on success, failure and timeout alike.
 */
export async function runSlicer<T>(
	request: SliceRequest,
	config: SlicerConfig,
	consume: (result: ExternalToolResult) => Promise<T>,
): Promise<T> {
	const paths = createScratchPaths(config, request.sourceFile.name);

	try {
		await fs.writeFile(paths.inputPath, request.sourceFile.data);
		if (DEBUG_LOGGING) console.log(`Input file: ${paths.inputPath} (${request.sourceFile.data.length} bytes)`);

		const result = await execute(config.slicerPath, buildSlicerArgs(request, paths, config.slicerArgs), config.timeoutMs, paths.outputPath);
		return await consume(result);
	} finally {
		await removeScratchFiles(paths);
	}
}
