import {promises as FSP} from 'fs';
import * as OS from 'os';
import * as Path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {BatchOptions, Converter, convertBatch, mergeFileName, sizeChange} from './converter';
import {FormValues, makeDefaultFormValues, resolveSettings} from './options';
import type {LogLevel} from './types';
import {AbortError, BinaryNotFoundError, ProcessExitError, runFFmpeg} from './lib/ffmpeg';
import {makeTranslator} from './lib/i18n';
import {QueueItem, exists, makeQueueItem} from './lib/media';
import type {MediaInfo, Probe} from './lib/probe';
import type {ProgressUpdate} from './lib/progress';

const t = makeTranslator('en');
const settingsWith = (values: Partial<FormValues> = {}) =>
	resolveSettings({...makeDefaultFormValues(), ...values}, {log: () => {}, t});

let dir: string;
let outputDirectory: string;

beforeEach(async () => {
	dir = await FSP.mkdtemp(Path.join(OS.tmpdir(), 'converter-test-'));
	outputDirectory = Path.join(dir, 'out');
});

afterEach(async () => {
	await FSP.rm(dir, {recursive: true, force: true});
});

async function inputItem(name: string) {
	const path = Path.join(dir, name);
	await FSP.writeFile(path, '0123456789');
	const item = makeQueueItem(path);
	if (!item) throw new Error(`Unsupported test file ${name}`);
	return item;
}

function outputOf(args: string[]) {
	const path = args[args.length - 1];
	if (!path) throw new Error('No output argument');
	return path;
}

const probe: Probe = async (path, kind) => {
	const size = await FSP.stat(path).then(
		(stat) => stat.size,
		() => undefined
	);
	if (size == null) return undefined;
	const info: MediaInfo = kind === 'video' ? {duration: 1000, videoCodec: 'h264', audioCodec: 'aac'} : {};
	return {...info, size};
};

/** Writes 6 bytes into the output, after reporting half of the progress. */
const succeed: typeof runFFmpeg = async (_ffmpegPath, args, {parser, onProgress} = {}) => {
	const update = parser?.feed('out_time_us=500000');
	if (update) onProgress?.(update);
	await FSP.writeFile(outputOf(args), 'xxxxxx');
};

function setup(items: QueueItem[], overrides: Partial<BatchOptions> = {}) {
	const logs: [LogLevel, string][] = [];
	const statuses: string[] = [];
	const updates: ProgressUpdate[] = [];
	const calls: string[][] = [];
	const run = overrides.run ?? succeed;

	const options: BatchOptions = {
		items,
		settings: settingsWith(),
		outputDirectory,
		ffmpegPath: '/bin/ffmpeg',
		ffprobePath: '/bin/ffprobe',
		caps: new Set(['libx264']),
		t,
		probe,
		now: () => 0,
		...overrides,
		run: (ffmpegPath, args, runOptions) => {
			calls.push(args);
			return run(ffmpegPath, args, runOptions);
		},
		utils: {
			log: (level, message) => logs.push([level, message]),
			status: (status) => statuses.push(status),
			progress: (update) => updates.push(update),
		},
	};

	return {options, logs, statuses, updates, calls};
}

describe('helpers', () => {
	it('describes size changes', () => {
		expect(sizeChange(1000, 600)).toBe('-40%');
		expect(sizeChange(1000, 1200)).toBe('+20%');
		expect(sizeChange(0, 1200)).toBe('?');
	});

	it('names merge outputs', () => {
		expect(mergeFileName(settingsWith({mergeName: 'trip'}))).toBe('trip.mp4');
		expect(mergeFileName(settingsWith({mergeName: 'trip.mkv', videoFormat: 'webm'}))).toBe('trip.mkv');
		expect(mergeFileName(settingsWith({mergeName: '../escape/trip', videoFormat: 'mkv'}))).toBe('trip.mkv');
	});
});

describe('convertBatch()', () => {
	it('stops without ffmpeg', async () => {
		const {options, logs, statuses} = setup([await inputItem('a.mov')], {ffmpegPath: undefined});
		expect(await convertBatch(options)).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(logs).toEqual([
			['error', 'ffmpeg not found. Set its path in preferences, FFMPEG_PATH, or install it to PATH.'],
		]);
		expect(statuses).toEqual(['Stopped']);
	});

	it('stops on empty queue', async () => {
		const {options, logs} = setup([]);
		expect((await convertBatch(options)).stopped).toBe(true);
		expect(logs).toEqual([['warn', 'Queue is empty, add some files first.']]);
	});

	it('converts videos and photos one after another', async () => {
		const video = await inputItem('a.mov');
		const photo = await inputItem('b.png');
		const {options, logs, statuses, updates, calls} = setup([video, photo]);

		const result = await convertBatch(options);

		const outputs = [Path.join(outputDirectory, 'a.mp4'), Path.join(outputDirectory, 'b.jpg')];
		expect(result).toEqual({stopped: false, completed: 2, failed: 0, outputs});
		expect(calls.map((args) => Path.basename(outputOf(args)))).toEqual([
			expect.stringMatching(/^a\.tmp-[0-9a-z]{6}\.mp4$/),
			expect.stringMatching(/^b\.tmp-[0-9a-z]{6}\.jpg$/),
		]);
		expect(calls.map((args) => Path.dirname(outputOf(args)))).toEqual([outputDirectory, outputDirectory]);
		expect((await FSP.readdir(outputDirectory)).sort()).toEqual(['a.mp4', 'b.jpg']);
		expect(await FSP.readFile(outputs[0] ?? '', 'utf8')).toBe('xxxxxx');
		expect(calls[0]?.slice(0, 3)).toEqual(['-n', '-i', video.path]);
		expect(statuses).toEqual(['Processing a.mov', 'Processing b.png', 'Done']);
		expect(logs).toContainEqual(['ok', 'Done: a.mp4 (-40%)']);
		expect(logs).toContainEqual(['ok', 'Done: b.jpg (-40%)']);
		expect(logs).toContainEqual(['info', 'Converting a.mov (video) → a.mp4']);
		expect(updates[0]?.file.fraction).toBe(0.5);
		expect(updates[0]?.total.fraction).toBe(0.5);
		expect(updates[1]?.total.fraction).toBe(1);
	});

	it('reports failures, removes partial output, and continues', async () => {
		const first = await inputItem('a.mov');
		const second = await inputItem('b.mov');
		const failing: typeof runFFmpeg = async (_ffmpegPath, args) => {
			if (Path.basename(outputOf(args)).startsWith('a.')) {
				await FSP.writeFile(outputOf(args), 'partial');
				throw new ProcessExitError(1, args, 'boom');
			}
			await FSP.writeFile(outputOf(args), 'xxxxxx');
		};
		const {options, logs} = setup([first, second], {run: failing});

		const result = await convertBatch(options);

		expect(result).toMatchObject({stopped: false, completed: 1, failed: 1});
		expect(await FSP.readdir(outputDirectory)).toEqual(['b.mp4']);
		expect(logs).toContainEqual(['error', 'ffmpeg exited with code 1']);
		expect(logs).toContainEqual(['error', 'Failed: a.mov']);
		expect(logs).toContainEqual(['ok', 'Done: b.mp4 (-40%)']);
	});

	it('skips missing inputs', async () => {
		const missing = makeQueueItem(Path.join(dir, 'gone.mov'));
		if (!missing) throw new Error('Unsupported test file');
		const present = await inputItem('b.mov');
		const {options, logs, calls} = setup([missing, present]);

		expect(await convertBatch(options)).toMatchObject({completed: 1, failed: 1});
		expect(logs).toContainEqual(['error', `File not found: ${missing.path}`]);
		expect(calls).toHaveLength(1);
	});

	it('never overwrites existing outputs unless asked to', async () => {
		const item = await inputItem('a.mov');
		await FSP.mkdir(outputDirectory);
		await FSP.writeFile(Path.join(outputDirectory, 'a.mp4'), 'original');
		const {options} = setup([item]);

		expect((await convertBatch(options)).outputs).toEqual([Path.join(outputDirectory, 'a (1).mp4')]);
		expect(await FSP.readFile(Path.join(outputDirectory, 'a.mp4'), 'utf8')).toBe('original');
	});

	it('replaces existing outputs when overwriting', async () => {
		const item = await inputItem('a.mov');
		const output = Path.join(outputDirectory, 'a.mp4');
		await FSP.mkdir(outputDirectory);
		await FSP.writeFile(output, 'original');
		const {options} = setup([item], {settings: settingsWith({overwrite: true})});

		expect((await convertBatch(options)).outputs).toEqual([output]);
		expect(await FSP.readFile(output, 'utf8')).toBe('xxxxxx');
		expect(await FSP.readdir(outputDirectory)).toEqual(['a.mp4']);
	});

	it('removes the temporary file when ffmpeg produces nothing', async () => {
		const {options, logs} = setup([await inputItem('a.mov')], {run: async () => {}});

		expect(await convertBatch(options)).toMatchObject({completed: 0, failed: 1});
		expect(logs).toContainEqual(['error', 'ffmpeg finished but produced no file: a.mp4']);
		expect(await FSP.readdir(outputDirectory)).toEqual([]);
	});

	it('halts when ffmpeg disappears mid-batch', async () => {
		const first = await inputItem('a.mov');
		const second = await inputItem('b.mov');
		const vanishing: typeof runFFmpeg = async () => {
			throw new BinaryNotFoundError('/bin/ffmpeg');
		};
		const {options, logs, statuses, calls} = setup([first, second], {run: vanishing});

		expect(await convertBatch(options)).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(calls).toHaveLength(1);
		expect(logs).toContainEqual(['error', 'ffmpeg disappeared while running: /bin/ffmpeg']);
		expect(logs).not.toContainEqual(['warn', 'Stopped by user.']);
		expect(statuses[statuses.length - 1]).toBe('Stopped');
	});

	it('stops when the output directory cannot be created', async () => {
		const blocker = Path.join(dir, 'blocker');
		await FSP.writeFile(blocker, '');
		const {options, logs, statuses, calls} = setup([await inputItem('a.mov')], {
			outputDirectory: Path.join(blocker, 'out'),
		});

		expect(await convertBatch(options)).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(logs).toHaveLength(1);
		expect(logs[0]?.[0]).toBe('error');
		expect(logs[0]?.[1].startsWith(`Couldn't create output directory ${Path.join(blocker, 'out')}: `)).toBe(true);
		expect(statuses).toEqual(['Stopped']);
		expect(calls).toEqual([]);
	});

	it('stops before converting when aborted while reading media info', async () => {
		const first = await inputItem('a.mov');
		const second = await inputItem('b.mov');
		const controller = new AbortController();
		const described: string[] = [];
		const aborting: Probe = async (path, kind) => {
			described.push(path);
			controller.abort();
			return probe(path, kind);
		};
		const {options, logs, statuses, calls} = setup([first, second], {probe: aborting, signal: controller.signal});

		expect(await convertBatch(options)).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(described).toEqual([first.path]);
		expect(calls).toEqual([]);
		expect(logs).toContainEqual(['warn', 'Stopped by user.']);
		expect(statuses).toEqual(['Stopped']);
	});

	it('expands the home directory in output paths', async () => {
		const home = OS.homedir();
		const {options, calls} = setup([await inputItem('a.mov')], {
			outputDirectory: `~/${Path.relative(home, outputDirectory)}`,
		});

		expect((await convertBatch(options)).outputs).toEqual([Path.join(outputDirectory, 'a.mp4')]);
		expect(Path.dirname(outputOf(calls[0] ?? []))).toBe(outputDirectory);
	});

	it('refuses to write over the input', async () => {
		const item = await inputItem('a.mp4');
		const {options, logs, calls} = setup([item], {outputDirectory: dir, settings: settingsWith({overwrite: true})});

		expect(await convertBatch(options)).toMatchObject({completed: 0, failed: 1});
		expect(logs).toContainEqual(['error', 'Output would overwrite the input, skipping: a.mp4']);
		expect(calls).toEqual([]);
	});

	it('drops missing watermark files', async () => {
		const item = await inputItem('a.mov');
		const watermark = Path.join(dir, 'missing.png');
		const {options, logs, calls} = setup([item], {settings: settingsWith({watermarkPath: watermark})});

		await convertBatch(options);

		expect(logs).toContainEqual(['warn', `Watermark image not found, ignoring it: ${watermark}`]);
		expect(calls[0]).not.toContain(watermark);
	});

	it('expands the home directory in watermark paths', async () => {
		const item = await inputItem('a.mov');
		const {options, logs} = setup([item], {settings: settingsWith({watermarkPath: '~/missing-watermark.png'})});

		await convertBatch(options);

		const expanded = Path.join(OS.homedir(), 'missing-watermark.png');
		expect(logs).toContainEqual(['warn', `Watermark image not found, ignoring it: ${expanded}`]);
	});

	it('merges videos through a concat list', async () => {
		const first = await inputItem('a.mp4');
		const second = await inputItem('b.mp4');
		const photo = await inputItem('c.png');
		let listContents = '';
		const merging: typeof runFFmpeg = async (ffmpegPath, args, runOptions) => {
			if (args.includes('concat')) listContents = await FSP.readFile(args[6] ?? '', 'utf8');
			await succeed(ffmpegPath, args, runOptions);
		};
		const {options, logs, calls} = setup([first, second, photo], {
			run: merging,
			settings: settingsWith({merge: true, mergeName: 'trip', fastCopy: true}),
		});

		const result = await convertBatch(options);

		expect(result.outputs).toEqual([Path.join(outputDirectory, 'trip.mp4'), Path.join(outputDirectory, 'c.jpg')]);
		expect(Path.basename(outputOf(calls[0] ?? []))).toMatch(/^trip\.tmp-[0-9a-z]{6}\.mp4$/);
		expect((await FSP.readdir(outputDirectory)).sort()).toEqual(['c.jpg', 'trip.mp4']);
		expect(calls[0]?.slice(0, 6)).toEqual(['-n', '-f', 'concat', '-safe', '0', '-i']);
		expect(calls[0]?.slice(7, 11)).toEqual(['-map', '0', '-c', 'copy']);
		expect(listContents).toBe(`file '${first.path}'\nfile '${second.path}'\n`);
		expect(await exists(calls[0]?.[6] ?? '')).toBe(false);
		expect(logs).toContainEqual(['info', 'Merging 2 videos into trip.mp4']);
		expect(logs).toContainEqual(['ok', 'Merged: trip.mp4 (-70%)']);
	});

	it('converts a lone video individually when merging', async () => {
		const {options, logs} = setup([await inputItem('a.mov')], {settings: settingsWith({merge: true})});

		expect((await convertBatch(options)).outputs).toEqual([Path.join(outputDirectory, 'a.mp4')]);
		expect(logs).toContainEqual(['warn', 'Merging needs at least two videos, converting individually.']);
	});
});

describe('Converter', () => {
	it('stops the running batch', async () => {
		const first = await inputItem('a.mov');
		const second = await inputItem('b.mov');
		let markStarted = () => {};
		const started = new Promise<void>((resolve) => {
			markStarted = resolve;
		});
		const hanging: typeof runFFmpeg = (_ffmpegPath, _args, {signal} = {}) =>
			new Promise((_resolve, reject) => {
				signal?.addEventListener('abort', () => reject(new AbortError()));
				markStarted();
			});
		const {options, logs, statuses, calls} = setup([first, second], {run: hanging});
		const converter = new Converter();

		const promise = converter.start(options);
		await started;

		expect(converter.isRunning).toBe(true);
		await expect(converter.start(options)).rejects.toThrow('A batch is already running.');
		expect(converter.stop()).toBe(true);

		expect(await promise).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(converter.isRunning).toBe(false);
		expect(converter.stop()).toBe(false);
		expect(calls).toHaveLength(1);
		expect(logs).toContainEqual(['warn', 'Stopped by user.']);
		expect(statuses[statuses.length - 1]).toBe('Stopped');
	});
});
