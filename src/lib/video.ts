import * as OS from 'os';
import * as Path from 'path';
import {promises as FSP} from 'fs';
import type {ConversionSettings} from '../options';
import type {Log} from '../types';
import type {MessageKey, Translate} from './i18n';
import type {MediaInfo} from './probe';
import {
	EncoderCaps,
	encoderQualityArgs,
	needsYuv420,
	resolveCodec,
	selectEncoder,
	takesSpeedPreset,
} from './encoders';
import {FilterSpec, makeAudioSpeedFilter, makeMetadataArgs, makeVideoFilterSpec} from './filters';
import {extensionOf} from './media';
import {uid} from './utils';

export type CopyDecision = {allowed: true} | {allowed: false; reason: MessageKey};

export interface CommandContext {
	settings: ConversionSettings;
	caps: EncoderCaps;
	log: Log;
	t: Translate;
}

const FASTSTART_EXTENSIONS = new Set(['mp4', 'mov', 'm4v']);

/**
 * Whether a container can hold a video codec as reported by ffprobe.
 * Unknown containers are assumed to hold anything.
 */
export function containerSupportsCodec(extension: string, videoCodec: string) {
	extension = extension.replace(/^\./, '').toLowerCase();
	videoCodec = videoCodec.toLowerCase();
	switch (extension) {
		case 'mkv':
			return true;
		case 'mp4':
		case 'm4v':
		case 'mov':
			return ['h264', 'hevc', 'h265', 'av1'].includes(videoCodec);
		case 'webm':
			return ['vp8', 'vp9', 'av1'].includes(videoCodec);
		case 'avi':
			return ['mpeg4', 'h264', 'xvid'].includes(videoCodec);
		default:
			return true;
	}
}

const usesFilters = (settings: ConversionSettings, outputExtension: string) =>
	makeVideoFilterSpec(settings, outputExtension).type !== 'none' || makeAudioSpeedFilter(settings.speed) != null;

/**
 * Stream copy into a new file is only possible when nothing about the
 * streams changes.
 */
export function fastCopyAllowed(
	inputPath: string,
	outputExtension: string,
	info: MediaInfo | undefined,
	settings: ConversionSettings
): CopyDecision {
	outputExtension = outputExtension.replace(/^\./, '').toLowerCase();
	if (outputExtension === 'gif') return {allowed: false, reason: 'copyGifNeedsEncode'};
	if (usesFilters(settings, outputExtension)) return {allowed: false, reason: 'copyFiltersUsed'};
	if (extensionOf(inputPath) !== outputExtension) return {allowed: false, reason: 'copyContainerDiffers'};
	if (info?.videoCodec && !containerSupportsCodec(outputExtension, info.videoCodec)) {
		return {allowed: false, reason: 'copyCodecIncompatible'};
	}
	return {allowed: true};
}

/**
 * Concatenating with stream copy needs identical codecs in all inputs.
 */
export function mergeCopyAllowed(
	inputPaths: string[],
	outputExtension: string,
	infos: ReadonlyMap<string, MediaInfo>,
	settings: ConversionSettings
): CopyDecision {
	outputExtension = outputExtension.replace(/^\./, '').toLowerCase();
	const firstPath = inputPaths[0];

	if (usesFilters(settings, outputExtension) || makeTrimArgs(settings).length > 0) {
		return {allowed: false, reason: 'copyFiltersOrTrim'};
	}
	if (!firstPath || extensionOf(firstPath) !== outputExtension) {
		return {allowed: false, reason: 'copyContainerDiffers'};
	}

	const videoCodecs = new Set<string>();
	const audioCodecs = new Set<string>();
	for (const path of inputPaths) {
		const info = infos.get(path);
		if (!info?.videoCodec) return {allowed: false, reason: 'copyNoProbeData'};
		videoCodecs.add(info.videoCodec);
		if (info.audioCodec) audioCodecs.add(info.audioCodec);
	}
	if (videoCodecs.size > 1 || audioCodecs.size > 1) return {allowed: false, reason: 'copyCodecsDiffer'};

	return {allowed: true};
}

/**
 * `-ss`/`-to` in seconds. End that isn't after start is dropped.
 */
export function makeTrimArgs({trimStart, trimEnd}: ConversionSettings, {log, t}: {log?: Log; t?: Translate} = {}) {
	const args: string[] = [];
	if (trimStart != null) args.push('-ss', (trimStart / 1000).toFixed(3));
	if (trimEnd != null) {
		if (trimStart != null && trimEnd <= trimStart) {
			if (t) log?.('warn', t('trimEndIgnored'));
		} else {
			args.push('-to', (trimEnd / 1000).toFixed(3));
		}
	}
	return args;
}

const overwriteFlag = (settings: ConversionSettings) => (settings.overwrite ? '-y' : '-n');

function copyTail(outputPath: string, settings: ConversionSettings) {
	const args = ['-map', '0', '-c', 'copy', ...makeMetadataArgs(settings.metadata)];
	if (FASTSTART_EXTENSIONS.has(extensionOf(outputPath))) args.push('-movflags', '+faststart');
	args.push(outputPath);
	return args;
}

function mapArgs(spec: FilterSpec) {
	switch (spec.type) {
		case 'none':
			return ['-map', '0:v:0?'];
		case 'simple':
			return ['-vf', spec.chain, '-map', '0:v:0?'];
		case 'complex':
			return ['-filter_complex', spec.graph, '-map', spec.outputLabel];
	}
}

/**
 * Everything after inputs and trim: filters, maps, codecs, and output.
 */
function encodeTail(spec: FilterSpec, outputPath: string, {settings, caps, log, t}: CommandContext) {
	const extension = extensionOf(outputPath);
	const args = mapArgs(spec);

	if (extension === 'gif') {
		args.push('-an', ...makeMetadataArgs(settings.metadata), outputPath);
		return args;
	}

	args.push('-map', '0:a:0?');
	const audioFilter = makeAudioSpeedFilter(settings.speed);
	if (audioFilter) args.push('-filter:a', audioFilter);

	const codec = resolveCodec(extension, settings.codec, {log, t});
	const {encoder, hardware} = selectEncoder(codec, settings.hardware, caps, {log, t});
	args.push('-c:v', encoder);
	if (!hardware && takesSpeedPreset(encoder)) args.push('-preset', settings.preset);
	args.push(...encoderQualityArgs(encoder, settings.crf));
	if (needsYuv420(encoder)) args.push('-pix_fmt', 'yuv420p');

	if (extension === 'webm') args.push('-c:a', 'libopus', '-b:a', '128k');
	else args.push('-c:a', 'aac', '-b:a', '192k');

	if (FASTSTART_EXTENSIONS.has(extension)) args.push('-movflags', '+faststart');

	args.push(...makeMetadataArgs(settings.metadata), outputPath);
	return args;
}

/**
 * ffmpeg arguments (without the binary) converting one video.
 */
export function buildVideoArgs(
	inputPath: string,
	outputPath: string,
	context: CommandContext & {fastCopy: boolean}
): string[] {
	const {settings} = context;
	const args = [overwriteFlag(settings), '-i', inputPath];
	const trim = makeTrimArgs(settings, context);

	if (context.fastCopy) return [...args, ...trim, ...copyTail(outputPath, settings)];

	const spec = makeVideoFilterSpec(settings, extensionOf(outputPath));
	if (spec.type === 'complex' && spec.watermarkInput) args.push('-i', spec.watermarkInput);

	return [...args, ...trim, ...encodeTail(spec, outputPath, context)];
}

/**
 * ffmpeg arguments (without the binary) concatenating videos listed in a
 * concat demuxer list file.
 */
export function buildMergeArgs(
	listPath: string,
	outputPath: string,
	context: CommandContext & {fastCopy: boolean}
): string[] {
	const {settings} = context;
	const spec = makeVideoFilterSpec(settings, extensionOf(outputPath));
	const args = [overwriteFlag(settings), '-f', 'concat', '-safe', '0', '-i', listPath];
	if (spec.type === 'complex' && spec.watermarkInput) args.push('-i', spec.watermarkInput);
	args.push(...makeTrimArgs(settings, context));

	if (context.fastCopy) return [...args, ...copyTail(outputPath, settings)];

	return [...args, ...encodeTail(spec, outputPath, context)];
}

/**
 * Concat demuxer list line. Single quotes can't be escaped inside single
 * quoted strings, so they are closed, escaped, and reopened.
 * ```
 * concatListLine("/a/it's.mp4"); // "file '/a/it'\''s.mp4'"
 * ```
 */
export const concatListLine = (path: string) => `file '${Path.resolve(path).replaceAll("'", "'\\''")}'`;

/**
 * Writes concat demuxer list into a temporary file, returns its path.
 */
export async function writeConcatList(inputPaths: string[], directory = OS.tmpdir()) {
	const listPath = Path.join(directory, `concat-${uid()}.txt`);
	await FSP.writeFile(listPath, inputPaths.map((path) => `${concatListLine(path)}\n`).join(''), 'utf8');
	return listPath;
}
