/**
 * HTTP tests against the in-process app, with the fake slicer script standing in for
 * the real slicer binary.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { promises as fs } from 'fs';
import path from 'path';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { isRunning, listScratchFiles, makeScratchDirs, removeScratchDirs, testConfig, type ScratchDirs } from './helpers.js';

// π·0.875²·1000 mm³ of 1.75 mm filament
const VOLUME_1000MM = (Math.PI * 0.875 ** 2 * 1000) / 1000;

describe('API Endpoints', () => {
	let dirs: ScratchDirs;
	let app: Express;

	beforeEach(async () => {
		dirs = await makeScratchDirs();
		app = createApp(testConfig(dirs));
	});

	afterEach(async () => {
		delete process.env.FAKE_SLICER_PID_FILE;
		await removeScratchDirs(dirs);
	});

	describe('GET /', () => {
		it('returns service status', async () => {
			const res = await request(app).get('/');

			expect(res.status).toBe(200);
			expect(res.body).toEqual({ service: 'SuperSlice API', status: 'running', version: '1.0.0' });
		});
	});

	describe('GET /filament-types', () => {
		it('returns the six densities', async () => {
			const res = await request(app).get('/filament-types');

			expect(res.status).toBe(200);
			expect(res.body).toEqual({
				filament_types: { PLA: 1.24, PETG: 1.27, ABS: 1.04, TPU: 1.21, NYLON: 1.14, ASA: 1.07 },
			});
			for (const density of Object.values<number>(res.body.filament_types)) {
				expect(density).toBeGreaterThan(0);
			}
		});
	});

	describe('POST /slice', () => {
		it('slices with default parameters', async () => {
			const res = await request(app).post('/slice').attach('file', Buffer.from('solid cube length=1000'), 'cube.stl');

			expect(res.status).toBe(200);
			expect(res.body).toEqual({
				success: true,
				print_time_minutes: 30.03,
				print_time_formatted: '30m 2s',
				filament_length_mm: 1000,
				filament_volume_cm3: 2.41,
				filament_weight_g: 2.98,
				filament_type: 'PLA',
				layer_height: 0.2,
				infill_density: 15,
				wall_count: 2,
			});
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('echoes supplied parameters', async () => {
			const res = await request(app)
				.post('/slice')
				.field('layer_height', '0.3')
				.field('infill_density', '50')
				.field('wall_count', '4')
				.field('filament_type', 'PETG')
				.attach('file', Buffer.from('solid cube length=1000'), 'cube.3mf');

			expect(res.status).toBe(200);
			expect(res.body.layer_height).toBe(0.3);
			expect(res.body.infill_density).toBe(50);
			expect(res.body.wall_count).toBe(4);
			expect(res.body.filament_type).toBe('PETG');
			// 2.4052… cm³ × 1.27
			expect(res.body.filament_weight_g).toBe(3.05);
		});

		it('uses filament_density over the table value', async () => {
			const res = await request(app)
				.post('/slice')
				.field('filament_type', 'PLA')
				.field('filament_density', '2')
				.attach('file', Buffer.from('solid cube length=1000'), 'cube.stl');

			expect(res.status).toBe(200);
			expect(res.body.filament_type).toBe('PLA');
			expect(res.body.filament_weight_g).toBe(Math.round(VOLUME_1000MM * 2 * 100) / 100);
			expect(res.body.filament_weight_g).not.toBe(Math.round(VOLUME_1000MM * 1.24 * 100) / 100);
		});

		it.each([
			['layer_height', '0.5', 'layer_height must be between 0.1 and 0.4 mm, got 0.5'],
			['layer_height', '0.05', 'layer_height must be between 0.1 and 0.4 mm, got 0.05'],
			['infill_density', '150', 'infill_density must be between 0 and 100, got 150'],
			['wall_count', '0', 'wall_count must be between 1 and 10, got 0'],
			['wall_count', '11', 'wall_count must be between 1 and 10, got 11'],
		])('rejects %s=%s before starting the slicer', async (field, value, detail) => {
			const pidFile = path.join(dirs.root, 'slicer.pid');
			process.env.FAKE_SLICER_PID_FILE = pidFile;

			const res = await request(app).post('/slice').field(field, value).attach('file', Buffer.from('solid cube'), 'cube.stl');

			expect(res.status).toBe(400);
			expect(res.body).toEqual({ detail });
			expect(await listScratchFiles(dirs)).toEqual([]);
			await expect(fs.access(pidFile)).rejects.toThrow();
		});

		it.each(['1e400', '1e308'])('rejects filament_density=%s before starting the slicer', async value => {
			const res = await request(app)
				.post('/slice')
				.field('filament_density', value)
				.attach('file', Buffer.from('solid cube length=1000'), 'cube.stl');

			expect(res.status).toBe(400);
			expect(res.body.detail).toMatch(/^filament_density must be at most 20 g\/cm³, got /);
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('rejects unsupported file types regardless of content', async () => {
			const res = await request(app).post('/slice').attach('file', Buffer.from('solid cube length=1000'), 'cube.obj');

			expect(res.status).toBe(400);
			expect(res.body).toEqual({ detail: 'Only STL and 3MF files are supported' });
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('rejects an unknown filament type without a density', async () => {
			const res = await request(app).post('/slice').field('filament_type', 'WOOD').attach('file', Buffer.from('solid'), 'cube.stl');

			expect(res.status).toBe(400);
			expect(res.body).toEqual({ detail: 'filament_type must be one of PLA, PETG, ABS, TPU, NYLON, ASA, got WOOD' });
		});

		it('requires a file', async () => {
			const res = await request(app).post('/slice').field('layer_height', '0.2');

			expect(res.status).toBe(400);
			expect(res.body).toEqual({ detail: 'file is required' });
		});

		it('rejects uploads over the size limit', async () => {
			const small = createApp(testConfig(dirs, { maxFileSize: 16 }));
			const res = await request(small).post('/slice').attach('file', Buffer.alloc(64, 'a'), 'cube.stl');

			expect(res.status).toBe(413);
			expect(res.body).toEqual({ detail: 'File exceeds the maximum upload size of 16 bytes' });
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('returns 500 with diagnostics when the slicer fails', async () => {
			const res = await request(app).post('/slice').attach('file', Buffer.from('fail'), 'cube.stl');

			expect(res.status).toBe(500);
			expect(res.body).toEqual({ detail: 'Slicing failed: Error: object has no facets' });
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('returns 500 when the output has no estimates', async () => {
			const res = await request(app).post('/slice').attach('file', Buffer.from('garbage'), 'cube.stl');

			expect(res.status).toBe(500);
			expect(res.body).toEqual({ detail: 'Could not find estimated print time in slicer output' });
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('returns 408 and kills the slicer on timeout', async () => {
			const pidFile = path.join(dirs.root, 'slicer.pid');
			process.env.FAKE_SLICER_PID_FILE = pidFile;
			const slow = createApp(testConfig(dirs, { timeoutMs: 2000 }));

			const res = await request(slow).post('/slice').attach('file', Buffer.from('hang'), 'cube.stl');

			expect(res.status).toBe(408);
			expect(res.body).toEqual({ detail: 'Slicing timeout - model too complex' });
			expect(isRunning(Number(await fs.readFile(pidFile, 'utf-8')))).toBe(false);
			expect(await listScratchFiles(dirs)).toEqual([]);
		});

		it('keeps parallel requests apart', async () => {
			const lengths = [1000, 2000, 3000, 4000, 5000];

			const responses = await Promise.all(
				lengths.map(length => request(app).post('/slice').attach('file', Buffer.from(`solid part length=${length}`), `part-${length}.stl`)),
			);

			expect(responses.map(res => res.status)).toEqual([200, 200, 200, 200, 200]);
			expect(responses.map(res => res.body.filament_length_mm)).toEqual(lengths);
			expect(await listScratchFiles(dirs)).toEqual([]);
		});
	});

	it('answers unknown routes with 404', async () => {
		const res = await request(app).get('/nope');

		expect(res.status).toBe(404);
		expect(res.body).toEqual({ detail: 'Not Found' });
	});
});
