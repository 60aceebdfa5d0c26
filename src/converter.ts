import {promises as FSP} from 'fs';
import * as Path from 'path';
import {saveAsPath} from '@drovp/save-as-path';
import type {ConversionSettings} from './options';
import type {Log} from './types';
import type {EncoderCaps} from './lib/encoders';
import type {Translate} from './lib/i18n';
import {AbortError, BinaryNotFoundError, ProcessExitError, runFFmpeg} from './lib/ffmpeg';
import {buildPhotoArgs} from './lib/image';
import {QueueItem, exists, expandHome, extensionOf} from './lib/media';
import {MediaInfo, Probe, describeMedia, makeProbe} from './lib/probe';
import {BatchState, Clock, ProgressParser, ProgressUpdate} from './lib/progress';
import {MessageError, eem, numberToPercent, uid} from './lib/utils';
import {buildMergeArgs, buildVideoArgs, fastCopyAllowed, mergeCopyAllowed, writeConcatList} from './lib/video';

export interface ConverterUtils {
	log: Log;
	status: (message: string) => void;
	progress: (update: ProgressUpdate) => void;
	/** Reports each produced file. */
	output?: (path: string) => void;
}

export interface BatchOptions {
	items: QueueItem[];
	settings: ConversionSettings;
	outputDirectory: string;
	ffmpegPath?: string;
	ffprobePath?: string;
	caps: EncoderCaps;
	t: Translate;
	utils: ConverterUtils;
	signal?: AbortSignal;
	/** Defaults to a probe over `ffprobePath`. */
	probe?: Probe;
	/** Defaults to spawning ffmpeg. */
	run?: typeof runFFmpeg;
	now?: Clock;
}

export interface BatchResult {
	/** Whether the batch ended before going through all items. */
	stopped: boolean;
	completed: number;
	failed: number;
	outputs: string[];
}

type Halt = 'aborted' | 'missingBinary';
type RunOutcome = {outcome: 'ok'; outputPath: string} | {outcome: 'failed' | Halt};

interface Job {
	/** Input the output is named after. */
	inputPath: string;
	args: string[];
	/** Where ffmpeg writes, the last of `args`. */
	tmpPath: string;
	/** Desired output file name, numbered when taken. */
	fileName: string;
	duration: number | undefined;
}

/**
 * Size of the result relative to the input.
 * ```
 * sizeChange(1000, 600); // '-40%'
 * sizeChange(1000, 1200); // '+20%'
 * ```
 */
export function sizeChange(inputSize: number, outputSize: number) {
	if (!(inputSize > 0)) return '?';
	const ratio = (outputSize - inputSize) / inputSize;
	return `${ratio > 0 ? '+' : ''}${numberToPercent(ratio)}`;
}

/**
 * Name of the merged file: `mergeName`, with the video format extension
 * appended when it has none.
 */
export function mergeFileName(settings: ConversionSettings) {
	const name = Path.basename(settings.mergeName.trim() || 'merged');
	return Path.extname(name) ? name : `${name}.${settings.videoFormat}`;
}

/**
 * Expands `~` in watermark and font paths, and drops the ones pointing to
 * files that don't exist.
 */
async function checkSettingFiles(settings: ConversionSettings, log: Log, t: Translate) {
	let {watermark, text} = settings;

	if (watermark) {
		const path = expandHome(watermark.path);
		if (await exists(path)) {
			watermark = {...watermark, path};
		} else {
			log('warn', t('watermarkMissing', {path}));
			watermark = undefined;
		}
	}

	if (text?.font) {
		const font = expandHome(text.font);
		if (await exists(font)) {
			text = {...text, font};
		} else {
			log('warn', t('fontMissing', {path: font}));
			text = {...text, font: undefined};
		}
	}

	return {...settings, watermark, text};
}

/**
 * Converts all items one after another.
 */
export async function convertBatch(options: BatchOptions): Promise<BatchResult> {
	const {items, ffmpegPath, ffprobePath, caps, t, signal, now = Date.now} = options;
	const outputDirectory = Path.resolve(expandHome(options.outputDirectory));
	const {log, status, progress, output} = options.utils;
	const run = options.run ?? runFFmpeg;
	const result: BatchResult = {stopped: false, completed: 0, failed: 0, outputs: []};

	if (!ffmpegPath) {
		log('error', t('ffmpegNotFound'));
		status(t('statusStopped'));
		return {...result, stopped: true};
	}

	const binary = ffmpegPath;

	if (items.length === 0) {
		log('warn', t('queueEmpty'));
		status(t('statusStopped'));
		return {...result, stopped: true};
	}

	const settings = await checkSettingFiles(options.settings, log, t);
	const batch: BatchState = {
		doneFiles: 0,
		totalFiles: items.length,
		doneDuration: 0,
		totalDuration: 0,
		startedAt: now(),
	};

	try {
		await FSP.mkdir(outputDirectory, {recursive: true});
	} catch (error) {
		log('error', t('outputDirectoryFailed', {path: outputDirectory, error: eem(error)}));
		status(t('statusStopped'));
		return {...result, stopped: true};
	}

	// Probe everything upfront so overall progress can be weighted by duration
	const infos = new Map<string, MediaInfo>();
	if (!ffprobePath) log('warn', t('ffprobeMissing'));
	const probe = options.probe ?? makeProbe({ffprobePath, onError: (error) => log('warn', eem(error))});
	for (const item of items) {
		if (signal?.aborted) break;
		const info = await probe(item.path, item.kind);
		if (!info) continue;
		infos.set(item.path, info);
		if (item.kind === 'video' && info.duration) batch.totalDuration += info.duration;
		log('info', describeMedia(item.name, info));
	}

	const tmpPathFor = (fileName: string) =>
		Path.join(outputDirectory, `${Path.parse(fileName).name}.tmp-${uid(6)}.${extensionOf(fileName)}`);

	/**
	 * Runs one ffmpeg command into a temporary file, and moves it to its
	 * destination when it succeeds.
	 */
	async function runOne({inputPath, args, tmpPath, fileName, duration}: Job): Promise<RunOutcome> {
		const parser = new ProgressParser(duration, {...batch}, now);

		try {
			await run(binary, args, {parser, onProgress: progress, onLog: log, signal});
			if (!(await exists(tmpPath))) {
				log('error', t('outputMissing', {path: fileName}));
				return {outcome: 'failed'};
			}
			const outputPath = await saveAsPath(inputPath, tmpPath, extensionOf(fileName), {
				destination: Path.join(outputDirectory, fileName),
				overwriteDestination: settings.overwrite,
				incrementer: 'parentheses',
			});
			return {outcome: 'ok', outputPath};
		} catch (error) {
			if (error instanceof AbortError) return {outcome: 'aborted'};
			if (error instanceof BinaryNotFoundError) {
				log('error', t('ffmpegNotFoundWhileRunning', {path: error.path}));
				return {outcome: 'missingBinary'};
			}
			if (error instanceof ProcessExitError) {
				log('error', t('exitCode', {code: `${error.code}`}));
				log('info', error.message);
			} else {
				log('error', eem(error));
			}
			return {outcome: 'failed'};
		} finally {
			await FSP.rm(tmpPath, {force: true});
		}
	}

	const reportDone = async (inputSize: number | undefined, outputPath: string, key: 'fileDone' | 'mergeDone') => {
		const {size} = await FSP.stat(outputPath);
		const change = inputSize != null ? sizeChange(inputSize, size) : '?';
		log('ok', t(key, {name: Path.basename(outputPath), change}));
		result.completed++;
		result.outputs.push(outputPath);
		output?.(outputPath);
	};

	const videos = items.filter((item) => item.kind === 'video');
	const [firstVideo] = videos;
	let merge = settings.merge;
	let halt: Halt | undefined = signal?.aborted ? 'aborted' : undefined;

	if (merge && videos.length < 2) {
		log('warn', t('mergeNeedsTwo'));
		merge = false;
	}

	if (merge && firstVideo && !halt) {
		const fileName = mergeFileName(settings);
		const tmpPath = tmpPathFor(fileName);
		const inputPaths = videos.map((item) => item.path);
		const duration = videos.reduce((sum, item) => sum + (infos.get(item.path)?.duration ?? 0), 0);
		const inputSize = videos.reduce((sum, item) => sum + (infos.get(item.path)?.size ?? 0), 0);

		status(t('statusMerging', {name: fileName}));
		log('info', t('mergeStart', {count: videos.length, name: fileName}));

		const decision = mergeCopyAllowed(inputPaths, extensionOf(fileName), infos, settings);
		if (settings.fastCopy && !decision.allowed) log('warn', t('mergeCopyDisabled', {reason: t(decision.reason)}));

		const listPath = await writeConcatList(inputPaths);
		let merged: RunOutcome;
		try {
			const args = buildMergeArgs(listPath, tmpPath, {
				settings,
				caps,
				log,
				t,
				fastCopy: settings.fastCopy && decision.allowed,
			});
			merged = await runOne({inputPath: firstVideo.path, args, tmpPath, fileName, duration: duration || undefined});
		} finally {
			await FSP.rm(listPath, {force: true});
		}

		if (merged.outcome === 'ok') {
			await reportDone(inputSize || undefined, merged.outputPath, 'mergeDone');
		} else if (merged.outcome === 'failed') {
			log('error', t('mergeFailed'));
			result.failed++;
		} else {
			halt = merged.outcome;
		}

		batch.doneFiles += videos.length;
		batch.doneDuration += duration;
	}

	for (const item of items) {
		if (!halt && signal?.aborted) halt = 'aborted';
		if (halt) break;

		if (merge && item.kind === 'video') continue;

		if (!(await exists(item.path))) {
			log('error', t('fileNotFound', {path: item.path}));
			result.failed++;
			batch.doneFiles++;
			progress(new ProgressParser(undefined, {...batch}, now).snapshot());
			continue;
		}

		const extension = item.kind === 'video' ? settings.videoFormat : settings.photoFormat;
		const fileName = `${Path.basename(item.path, Path.extname(item.path))}.${extension}`;
		const tmpPath = tmpPathFor(fileName);

		if (settings.overwrite && Path.join(outputDirectory, fileName) === Path.resolve(item.path)) {
			log('error', t('outputIsInput', {name: item.name}));
			result.failed++;
			batch.doneFiles++;
			continue;
		}

		const info = infos.get(item.path);
		const duration = item.kind === 'video' ? info?.duration : undefined;

		status(t('statusProcessing', {name: item.name}));
		log('info', t('fileStart', {name: item.name, kind: item.kind, output: fileName}));

		let args: string[];
		if (item.kind === 'video') {
			const decision = fastCopyAllowed(item.path, extension, info, settings);
			if (settings.fastCopy && !decision.allowed) {
				log('warn', t('fastCopyDisabled', {name: item.name, reason: t(decision.reason)}));
			}
			args = buildVideoArgs(item.path, tmpPath, {
				settings,
				caps,
				log,
				t,
				fastCopy: settings.fastCopy && decision.allowed,
			});
		} else {
			args = buildPhotoArgs(item.path, tmpPath, settings);
		}

		const converted = await runOne({inputPath: item.path, args, tmpPath, fileName, duration});

		if (converted.outcome === 'ok') {
			await reportDone(info?.size ?? (await FSP.stat(item.path)).size, converted.outputPath, 'fileDone');
		} else if (converted.outcome === 'failed') {
			log('error', t('fileFailed', {name: item.name}));
			result.failed++;
		} else {
			halt = converted.outcome;
			break;
		}

		batch.doneFiles++;
		if (duration) batch.doneDuration += duration;
	}

	if (halt === 'aborted') log('warn', t('stoppedByUser'));
	result.stopped = halt != null;
	status(result.stopped ? t('statusStopped') : t('statusDone'));
	return result;
}

/**
 * Runs one batch at a time and can stop it.
 */
export class Converter {
	private controller: AbortController | null = null;

	get isRunning() {
		return this.controller != null;
	}

	async start(options: Omit<BatchOptions, 'signal'>): Promise<BatchResult> {
		if (this.controller) throw new MessageError(options.t('alreadyRunning'));
		const controller = new AbortController();
		this.controller = controller;
		try {
			return await convertBatch({...options, signal: controller.signal});
		} finally {
			this.controller = null;
		}
	}

	/**
	 * Terminates the live process, and ends the batch. Returns `false` when
	 * nothing was running.
	 */
	stop() {
		if (!this.controller) return false;
		this.controller.abort();
		return true;
	}
}
