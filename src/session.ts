import {MAX_LOG_LINES, getPreferencesPath, getPresetsPath} from './config';
import {BatchResult, Converter} from './converter';
import {FormValues, OptionName, applyPreset, coerceFormValues, makeDefaultFormValues, resolveSettings} from './options';
import type {LogLevel} from './types';
import {findFFmpeg, findFFprobe} from './lib/binaries';
import {detectEncoders, summarizeEncoders} from './lib/encoders';
import type {runFFmpeg} from './lib/ffmpeg';
import {Translate, makeTranslator} from './lib/i18n';
import {QueueItem, expandPaths, makeQueueItem} from './lib/media';
import {Preferences, loadPreferences, savePreferences} from './lib/preferences';
import {PresetStore} from './lib/presets';
import {MediaInfo, Probe, makeProbe} from './lib/probe';
import {Clock, ProgressUpdate, formatPercent} from './lib/progress';
import {Palette, resolveTheme} from './lib/themes';
import {eem, formatBytes, formatTime} from './lib/utils';

export interface LogEntry {
	time: number;
	level: LogLevel;
	message: string;
}

/**
 * Selected queue item description, formatted for display.
 */
export interface SelectionInfo {
	name: string;
	duration: string;
	codecs: string;
	resolution: string;
	size: string;
	container: string;
}

export interface Binaries {
	ffmpegPath?: string;
	ffprobePath?: string;
}

export interface SessionOptions {
	presets: PresetStore;
	preferences: Preferences;
	preferencesPath: string;
	/** Resolves binaries, preferring the configured ffmpeg path when not empty. */
	findBinaries?: (preferredFFmpegPath: string) => Promise<Binaries>;
	detect?: (ffmpegPath: string) => Promise<Set<string>>;
	makeProbe?: (binaries: Binaries) => Probe;
	run?: typeof runFFmpeg;
	now?: Clock;
}

export type Listener = (session: Session) => void;

export function describeSelection(name: string, info?: MediaInfo): SelectionInfo {
	return {
		name,
		duration: formatTime(info?.duration),
		codecs: info ? `${info.videoCodec ?? '-'} / ${info.audioCodec ?? '-'}` : '—',
		resolution: info?.width && info.height ? `${info.width}x${info.height}` : '—',
		size: info ? formatBytes(info.size) : '—',
		container: info?.container || '—',
	};
}

/**
 * Progress texts.
 * ```
 * // 'File: 42% • 00:10 / 01:00 • ETA 00:50'
 * // 'Total: 12% • ETA 03:10'
 * ```
 */
export function formatProgress({file, total}: ProgressUpdate, t: Translate) {
	return {
		file:
			file.fraction != null
				? t('fileProgress', {
						percent: formatPercent(file.fraction),
						time: formatTime(file.outTime),
						duration: formatTime(file.duration),
						eta: formatTime(file.eta),
				  })
				: t('fileProgressIdle'),
		total: t('totalProgress', {percent: formatPercent(total.fraction), eta: formatTime(total.eta)}),
	};
}

async function defaultFindBinaries(preferredFFmpegPath: string): Promise<Binaries> {
	const ffmpegPath = preferredFFmpegPath || (await findFFmpeg());
	return {ffmpegPath, ffprobePath: await findFFprobe(ffmpegPath)};
}

/**
 * Headless UI state. Front-ends call its methods and re-render on notifications.
 */
export class Session {
	queue: QueueItem[] = [];
	form: FormValues = makeDefaultFormValues();
	selection: SelectionInfo | undefined;
	binaries: Binaries = {};
	caps: Set<string> = new Set();
	encoderInfo: string;
	status: string;
	fileProgress = 0;
	totalProgress = 0;
	fileProgressText: string;
	totalProgressText: string;
	log: LogEntry[] = [];
	/** Entries ever logged, including those trimmed off `log`. */
	logCount = 0;
	lastResult: BatchResult | undefined;

	readonly presets: PresetStore;
	private preferencesValue: Preferences;
	private readonly options: SessionOptions;
	private readonly converter = new Converter();
	private readonly infoCache = new Map<string, MediaInfo>();
	private readonly listeners = new Set<Listener>();
	private translate: Translate;
	/** Set while binaries are being located, before the converter runs. */
	private starting = false;

	constructor(options: SessionOptions) {
		this.options = options;
		this.presets = options.presets;
		this.preferencesValue = options.preferences;
		this.translate = makeTranslator(options.preferences.language);
		this.encoderInfo = this.t('encodersAvailable', {list: '--'});
		this.status = this.t('statusReady');
		this.fileProgressText = this.t('fileProgressIdle');
		this.totalProgressText = this.t('totalProgressIdle');
	}

	/**
	 * Session over the stored presets and preferences.
	 */
	static async create({
		env = process.env,
		onInvalid,
		...rest
	}: {env?: NodeJS.ProcessEnv; onInvalid?: (message: string) => void} & Partial<
		Omit<SessionOptions, 'presets' | 'preferences' | 'preferencesPath'>
	> = {}) {
		const preferencesPath = getPreferencesPath(env);
		const [preferences, presets] = await Promise.all([
			loadPreferences(preferencesPath, {onInvalid}),
			PresetStore.load(getPresetsPath(env), {onInvalid}),
		]);
		return new Session({
			findBinaries: async (preferred) => {
				const ffmpegPath = preferred || (await findFFmpeg({env}));
				return {ffmpegPath, ffprobePath: await findFFprobe(ffmpegPath, {env})};
			},
			...rest,
			presets,
			preferences,
			preferencesPath,
		});
	}

	get t(): Translate {
		return this.translate;
	}

	get preferences(): Readonly<Preferences> {
		return this.preferencesValue;
	}

	get theme(): Palette {
		const {theme, customColors, accent} = this.preferencesValue;
		return resolveTheme(theme, {custom: customColors, accent});
	}

	get isRunning() {
		return this.starting || this.converter.isRunning;
	}

	subscribe(listener: Listener) {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private notify() {
		for (const listener of this.listeners) listener(this);
	}

	addLog(level: LogLevel, message: string) {
		this.log.push({time: (this.options.now ?? Date.now)(), level, message});
		this.logCount++;
		if (this.log.length > MAX_LOG_LINES) this.log.splice(0, this.log.length - MAX_LOG_LINES);
		this.notify();
	}

	private setStatus(status: string) {
		this.status = status;
		this.notify();
	}

	/**
	 * Queue.
	 */

	async addPaths(paths: string[]) {
		const added: QueueItem[] = [];
		for (const path of await expandPaths(paths)) {
			const item = makeQueueItem(path);
			if (item) added.push(item);
		}

		if (added.length > 0) {
			this.queue = [...this.queue, ...added];
			this.addLog('ok', this.t('filesAdded', {count: added.length}));
		} else {
			this.addLog('warn', this.t('noSupportedFiles'));
		}

		return added;
	}

	removeIndices(indices: number[]) {
		if (indices.length === 0) return;
		const remove = new Set(indices);
		const before = this.queue.length;
		this.queue = this.queue.filter((_, index) => !remove.has(index));
		this.selection = undefined;
		this.addLog('info', this.t('filesRemoved', {count: before - this.queue.length}));
	}

	clearQueue() {
		this.queue = [];
		this.selection = undefined;
		this.addLog('info', this.t('queueCleared'));
	}

	/**
	 * Selects a queue item and describes it, probing when not cached.
	 */
	async select(index: number) {
		const item = this.queue[index];
		if (!item) {
			this.selection = undefined;
			this.notify();
			return undefined;
		}

		this.selection = describeSelection(item.name);
		this.notify();

		let info = this.infoCache.get(item.path);
		if (!info) {
			const binaries = await this.ensureBinaries();
			info = await this.makeProbe(binaries)(item.path, item.kind);
			if (info) this.infoCache.set(item.path, info);
		}

		// Selection might have changed while probing
		if (info && this.queue[index] === item) {
			this.selection = describeSelection(item.name, info);
			this.notify();
		}

		return this.selection;
	}

	/**
	 * Form & presets.
	 */

	setFormValues(raw: Record<string, unknown>) {
		const values = coerceFormValues(raw, (name, value) =>
			this.addLog('warn', this.t('invalidField', {field: name, value: `${value}`}))
		);
		this.form = {...this.form, ...values};
		this.notify();
		return values;
	}

	setFormValue<K extends OptionName>(name: K, value: FormValues[K]) {
		const form = {...this.form};
		form[name] = value;
		this.form = form;
		this.notify();
	}

	loadPreset(name: string) {
		const preset = this.presets.get(name);
		if (!preset) {
			this.addLog('warn', this.t('presetNotFound', {name}));
			return false;
		}
		this.form = applyPreset(this.form, preset);
		this.addLog('ok', this.t('presetLoaded', {name}));
		return true;
	}

	async savePreset(name: string, {overwrite = false}: {overwrite?: boolean} = {}) {
		await this.presets.save(name, this.form, {overwrite});
		this.addLog('ok', this.t('presetSaved', {name: name.trim()}));
	}

	async deletePreset(name: string) {
		const deleted = await this.presets.delete(name);
		if (deleted) this.addLog('ok', this.t('presetDeleted', {name}));
		else this.addLog('warn', this.t('presetNotFound', {name}));
		return deleted;
	}

	/**
	 * Preferences.
	 */

	/**
	 * Updates preferences, and unless `persist` is `false`, saves them.
	 */
	async setPreferences(patch: Partial<Preferences>, {persist = true}: {persist?: boolean} = {}) {
		const ffmpegChanged = patch.ffmpegPath != null && patch.ffmpegPath !== this.preferencesValue.ffmpegPath;
		this.preferencesValue = {...this.preferencesValue, ...patch};
		this.translate = makeTranslator(this.preferencesValue.language);
		if (ffmpegChanged) this.binaries = {};
		if (persist) await savePreferences(this.options.preferencesPath, this.preferencesValue);
		this.notify();
	}

	/**
	 * Binaries & encoders.
	 */

	private makeProbe(binaries: Binaries) {
		return (this.options.makeProbe ?? makeProbe)({
			...binaries,
			onError: (error: unknown) => this.addLog('warn', eem(error)),
		});
	}

	private async ensureBinaries() {
		if (!this.binaries.ffmpegPath) {
			this.binaries = await (this.options.findBinaries ?? defaultFindBinaries)(this.preferencesValue.ffmpegPath);
		}
		return this.binaries;
	}

	/**
	 * Locates binaries again and detects available encoders.
	 */
	async refreshEncoders() {
		this.binaries = {};
		const {ffmpegPath, ffprobePath} = await this.ensureBinaries();

		if (!ffmpegPath) {
			this.addLog('error', this.t('ffmpegNotFound'));
			return this.caps;
		}

		this.caps = await (this.options.detect ?? detectEncoders)(ffmpegPath);
		const summary = summarizeEncoders(this.caps);
		this.encoderInfo = this.t('encodersAvailable', {list: summary.length > 0 ? summary.join(', ') : this.t('none')});
		this.addLog('ok', this.t('ffmpegFound', {path: ffmpegPath}));
		if (ffprobePath) this.addLog('ok', this.t('ffprobeFound', {path: ffprobePath}));
		else this.addLog('warn', this.t('ffprobeMissing'));

		return this.caps;
	}

	/**
	 * Running.
	 */

	private onProgress = (update: ProgressUpdate) => {
		const {file, total} = formatProgress(update, this.t);
		this.fileProgress = update.file.fraction ?? 0;
		this.totalProgress = update.total.fraction;
		this.fileProgressText = file;
		this.totalProgressText = total;
		this.notify();
	};

	/**
	 * Converts the queue with current form values. Resolves when the batch
	 * ends, `undefined` when it couldn't start.
	 */
	async start(): Promise<BatchResult | undefined> {
		if (this.isRunning) return undefined;

		let binaries: Binaries;
		this.starting = true;
		try {
			binaries = await this.ensureBinaries();
		} finally {
			this.starting = false;
		}

		const {ffmpegPath, ffprobePath} = binaries;
		if (!ffmpegPath) {
			this.addLog('error', this.t('ffmpegNotFound'));
			return undefined;
		}
		if (this.queue.length === 0) {
			this.addLog('warn', this.t('queueEmpty'));
			return undefined;
		}

		const log = (level: LogLevel, message: string) => this.addLog(level, message);
		const settings = resolveSettings(this.form, {log, t: this.t});

		this.fileProgress = 0;
		this.totalProgress = 0;
		this.fileProgressText = this.t('fileProgressIdle');
		this.totalProgressText = this.t('totalProgressIdle');
		this.setStatus(this.t('statusStarted'));

		const promise = this.converter.start({
			items: [...this.queue],
			settings,
			outputDirectory: this.preferencesValue.outputDirectory,
			ffmpegPath,
			ffprobePath,
			caps: this.caps,
			t: this.t,
			probe: this.makeProbe({ffmpegPath, ffprobePath}),
			run: this.options.run,
			now: this.options.now,
			utils: {
				log,
				status: (status) => this.setStatus(status),
				progress: this.onProgress,
				output: (path) => this.addLog('info', path),
			},
		});
		this.notify();

		try {
			this.lastResult = await promise;
			return this.lastResult;
		} catch (error) {
			this.addLog('error', eem(error));
			this.setStatus(this.t('statusStopped'));
			return undefined;
		} finally {
			this.notify();
		}
	}

	/**
	 * Stops the running batch. Returns `false` when nothing was running.
	 */
	stop() {
		if (!this.converter.isRunning) return false;
		this.setStatus(this.t('statusStopping'));
		return this.converter.stop();
	}
}
