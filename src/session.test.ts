import {promises as FSP} from 'fs';
import * as OS from 'os';
import * as Path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {Session, SessionOptions, describeSelection, formatProgress} from './session';
import {AbortError, runFFmpeg} from './lib/ffmpeg';
import {makeTranslator} from './lib/i18n';
import {exists} from './lib/media';
import {DEFAULT_PREFERENCES, loadPreferences} from './lib/preferences';
import {PresetStore} from './lib/presets';
import type {Probe} from './lib/probe';

let dir: string;

beforeEach(async () => {
	dir = await FSP.mkdtemp(Path.join(OS.tmpdir(), 'session-test-'));
});

afterEach(async () => {
	await FSP.rm(dir, {recursive: true, force: true});
});

const probe: Probe = async (_path, kind) =>
	kind === 'video'
		? {duration: 1000, width: 1920, height: 1080, videoCodec: 'h264', audioCodec: 'aac', container: 'mov', size: 10}
		: {width: 640, height: 480, container: 'png', size: 10};

const run: typeof runFFmpeg = async (_ffmpegPath, args, {parser, onProgress} = {}) => {
	const update = parser?.feed('out_time_us=500000');
	if (update) onProgress?.(update);
	const output = args[args.length - 1];
	if (output) await FSP.writeFile(output, 'xx');
};

function makeSession(overrides: Partial<SessionOptions> = {}) {
	return new Session({
		presets: PresetStore.fromEntries(Path.join(dir, 'presets.json'), [['Mine', {crf: 18, codec: 'h265'}]]),
		preferences: {...DEFAULT_PREFERENCES, outputDirectory: Path.join(dir, 'out')},
		preferencesPath: Path.join(dir, 'preferences.json'),
		findBinaries: async () => ({ffmpegPath: '/bin/ffmpeg', ffprobePath: '/bin/ffprobe'}),
		detect: async () => new Set(['libx264', 'h264_nvenc']),
		makeProbe: () => probe,
		run,
		now: () => 0,
		...overrides,
	});
}

const messages = (session: Session) => session.log.map(({level, message}) => `${level}: ${message}`);

async function addFile(session: Session, name: string) {
	const path = Path.join(dir, name);
	await FSP.writeFile(path, '0123456789');
	await session.addPaths([path]);
	return path;
}

describe('helpers', () => {
	it('describes selections', () => {
		expect(describeSelection('a.mov')).toEqual({
			name: 'a.mov',
			duration: '--:--',
			codecs: '—',
			resolution: '—',
			size: '—',
			container: '—',
		});
		expect(describeSelection('a.mov', {duration: 65000, videoCodec: 'h264', size: 1536})).toEqual({
			name: 'a.mov',
			duration: '01:05',
			codecs: 'h264 / -',
			resolution: '—',
			size: '1.5 KB',
			container: '—',
		});
	});

	it('formats progress', () => {
		const t = makeTranslator('en');
		expect(formatProgress({file: {outTime: 0}, total: {fraction: 0.05}}, t)).toEqual({
			file: 'File: --',
			total: 'Total: 05% • ETA --:--',
		});
		const update = {
			file: {fraction: 0.25, outTime: 5000, duration: 20000, eta: 15000},
			total: {fraction: 0.1, eta: 90000},
		};
		expect(formatProgress(update, t)).toEqual({
			file: 'File: 25% • 00:05 / 00:20 • ETA 00:15',
			total: 'Total: 10% • ETA 01:30',
		});
	});
});

describe('Session', () => {
	it('starts idle', () => {
		const session = makeSession();
		expect(session.status).toBe('Ready');
		expect(session.encoderInfo).toBe('Encoders: --');
		expect(session.fileProgressText).toBe('File: --');
		expect(session.totalProgressText).toBe('Total: --');
		expect(session.isRunning).toBe(false);
		expect(session.stop()).toBe(false);
	});

	it('manages the queue', async () => {
		const session = makeSession();
		let notifications = 0;
		session.subscribe(() => notifications++);

		await addFile(session, 'a.mov');
		await addFile(session, 'b.png');
		await session.addPaths([Path.join(dir, 'notes.txt')]);
		expect(session.queue.map((item) => item.name)).toEqual(['a.mov', 'b.png']);

		session.removeIndices([0]);
		expect(session.queue.map((item) => item.name)).toEqual(['b.png']);
		session.clearQueue();
		expect(session.queue).toEqual([]);

		expect(messages(session)).toEqual([
			'ok: Added files: 1',
			'ok: Added files: 1',
			'warn: No supported files found.',
			'info: Removed files: 1',
			'info: Queue cleared.',
		]);
		expect(notifications).toBe(5);
		expect(session.logCount).toBe(5);
	});

	it('describes the selected item', async () => {
		const session = makeSession();
		await addFile(session, 'a.mov');

		expect(await session.select(0)).toEqual({
			name: 'a.mov',
			duration: '00:01',
			codecs: 'h264 / aac',
			resolution: '1920x1080',
			size: '10.0 B',
			container: 'mov',
		});
		expect(await session.select(5)).toBeUndefined();
		expect(session.selection).toBeUndefined();
	});

	it('validates form values', () => {
		const session = makeSession();
		expect(session.setFormValues({crf: 'abc', preset: 'slow', bogus: 1})).toEqual({preset: 'slow'});
		expect(session.form.preset).toBe('slow');
		expect(session.form.crf).toBe(23);
		expect(messages(session)).toEqual(['warn: Invalid value for crf: abc', 'warn: Invalid value for bogus: 1']);

		session.setFormValue('merge', true);
		expect(session.form.merge).toBe(true);
	});

	it('loads, saves, and deletes presets', async () => {
		const session = makeSession();
		session.setFormValue('videoFormat', 'mkv');

		expect(session.loadPreset('Mine')).toBe(true);
		expect(session.form).toMatchObject({crf: 18, codec: 'h265', videoFormat: 'mkv'});
		expect(session.loadPreset('Nope')).toBe(false);

		await session.savePreset(' Copy ');
		const saved: unknown = JSON.parse(await FSP.readFile(Path.join(dir, 'presets.json'), 'utf8'));
		expect(saved).toHaveProperty(['Copy', 'crf'], 18);
		await expect(session.savePreset('Copy')).rejects.toThrow('Preset "Copy" already exists.');

		expect(await session.deletePreset('Copy')).toBe(true);
		expect(await session.deletePreset('Copy')).toBe(false);
		expect(messages(session)).toEqual([
			'ok: Preset loaded: Mine',
			'warn: Preset not found: Nope',
			'ok: Preset saved: Copy',
			'ok: Preset deleted: Copy',
			'warn: Preset not found: Copy',
		]);
	});

	it('persists preferences unless told not to', async () => {
		const session = makeSession();
		const path = Path.join(dir, 'preferences.json');

		await session.setPreferences({theme: 'dark'}, {persist: false});
		expect(session.preferences.theme).toBe('dark');
		expect(await exists(path)).toBe(false);

		await session.setPreferences({language: 'uk'});
		expect(session.t('queueCleared')).not.toBe('Queue cleared.');
		expect(await loadPreferences(path)).toMatchObject({theme: 'dark', language: 'uk'});
	});

	it('applies accent over the theme', async () => {
		const session = makeSession();
		await session.setPreferences({accent: '#ff0000'}, {persist: false});
		expect(session.theme.accent).toBe('#ff0000');
	});

	it('detects encoders', async () => {
		const session = makeSession();
		expect([...(await session.refreshEncoders())]).toEqual(['libx264', 'h264_nvenc']);
		expect(session.encoderInfo).toBe('Encoders: NVENC');
		expect(messages(session)).toEqual(['ok: ffmpeg: /bin/ffmpeg', 'ok: ffprobe: /bin/ffprobe']);
	});

	it('reports missing binaries', async () => {
		const session = makeSession({findBinaries: async () => ({})});
		await addFile(session, 'a.mov');

		await session.refreshEncoders();
		expect(await session.start()).toBeUndefined();
		expect(messages(session).slice(1)).toEqual([
			'error: ffmpeg not found. Set its path in preferences, FFMPEG_PATH, or install it to PATH.',
			'error: ffmpeg not found. Set its path in preferences, FFMPEG_PATH, or install it to PATH.',
		]);
	});

	it('does not start on empty queue', async () => {
		const session = makeSession();
		expect(await session.start()).toBeUndefined();
		expect(messages(session)).toEqual(['warn: Queue is empty, add some files first.']);
	});

	it('converts the queue', async () => {
		const session = makeSession();
		const statuses: string[] = [];
		session.subscribe(({status}) => {
			if (statuses[statuses.length - 1] !== status) statuses.push(status);
		});
		await addFile(session, 'a.mov');

		const result = await session.start();

		const output = Path.join(dir, 'out', 'a.mp4');
		expect(result).toEqual({stopped: false, completed: 1, failed: 0, outputs: [output]});
		expect(session.lastResult).toBe(result);
		expect(await FSP.readFile(output, 'utf8')).toBe('xx');
		expect(statuses).toEqual(['Ready', 'Started', 'Processing a.mov', 'Done']);
		expect(session.fileProgress).toBe(0.5);
		expect(session.totalProgress).toBe(0.5);
		expect(session.fileProgressText).toBe('File: 50% • 00:01 / 00:01 • ETA 00:00');
		expect(session.totalProgressText).toBe('Total: 50% • ETA 00:00');
		expect(messages(session)).toContain('ok: Done: a.mp4 (-80%)');
		expect(session.isRunning).toBe(false);
	});

	it('ignores a second start while the first is locating binaries', async () => {
		let calls = 0;
		const session = makeSession({
			findBinaries: async () => {
				calls++;
				return {ffmpegPath: '/bin/ffmpeg', ffprobePath: '/bin/ffprobe'};
			},
		});
		await addFile(session, 'a.mov');

		const [first, second] = await Promise.all([session.start(), session.start()]);

		expect(first).toMatchObject({stopped: false, completed: 1});
		expect(second).toBeUndefined();
		expect(calls).toBe(1);
		expect(messages(session)).not.toContain('error: A batch is already running.');
	});

	it('stops a running batch', async () => {
		let markStarted = () => {};
		const started = new Promise<void>((resolve) => {
			markStarted = resolve;
		});
		const hanging: typeof runFFmpeg = (_ffmpegPath, _args, {signal} = {}) =>
			new Promise((_resolve, reject) => {
				signal?.addEventListener('abort', () => reject(new AbortError()));
				markStarted();
			});
		const session = makeSession({run: hanging});
		const statuses: string[] = [];
		session.subscribe(({status}) => {
			if (statuses[statuses.length - 1] !== status) statuses.push(status);
		});
		await addFile(session, 'a.mov');

		const promise = session.start();
		await started;
		expect(session.isRunning).toBe(true);
		expect(session.stop()).toBe(true);

		expect(await promise).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(statuses).toEqual(['Ready', 'Started', 'Processing a.mov', 'Stopping...', 'Stopped']);
		expect(session.status).toBe('Stopped');
		expect(messages(session)).toContain('warn: Stopped by user.');
		expect(session.isRunning).toBe(false);
	});

	it('stops when the output directory cannot be created', async () => {
		const blocker = Path.join(dir, 'blocker');
		await FSP.writeFile(blocker, '');
		const session = makeSession();
		await session.setPreferences({outputDirectory: Path.join(blocker, 'out')}, {persist: false});
		await addFile(session, 'a.mov');

		expect(await session.start()).toEqual({stopped: true, completed: 0, failed: 0, outputs: []});
		expect(session.status).toBe('Stopped');
		expect(session.log.filter(({level}) => level === 'error')).toHaveLength(1);
		expect(session.isRunning).toBe(false);
	});
});
