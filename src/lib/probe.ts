import {promises as FSP} from 'fs';
import {ffprobe} from 'ffprobe-normalized';
import type {Metadata as SharpMetadata} from 'sharp';
import type {MediaKind} from './media';
import {extensionOf} from './media';
import {formatBytes, formatTime} from './utils';

/**
 * What the converter and session need to know about an input.
 */
export interface MediaInfo {
	/** Milliseconds. */
	duration?: number;
	videoCodec?: string;
	audioCodec?: string;
	width?: number;
	height?: number;
	container?: string;
	/** Bytes. */
	size?: number;
}

/**
 * Fields of ffprobe-normalized's image/audio/video meta we read.
 */
export interface ProbedMeta {
	type: string;
	codec?: string;
	container?: string;
	size?: number;
	duration?: number;
	width?: number;
	height?: number;
	audioStreams?: {codec?: string}[];
}

export type Probe = (path: string, kind: MediaKind) => Promise<MediaInfo | undefined>;

export function fromProbedMeta(meta: ProbedMeta): MediaInfo {
	const info: MediaInfo = {container: meta.container, size: meta.size};

	switch (meta.type) {
		case 'video':
			info.videoCodec = meta.codec;
			info.audioCodec = meta.audioStreams?.[0]?.codec;
			info.duration = meta.duration;
			info.width = meta.width;
			info.height = meta.height;
			break;
		case 'audio':
			info.audioCodec = meta.codec;
			info.duration = meta.duration;
			break;
		case 'image':
			info.videoCodec = meta.codec;
			info.width = meta.width;
			info.height = meta.height;
			break;
	}

	return info;
}

/**
 * Sharp can only describe single frame images.
 */
export function fromSharpMetadata({format, width, height, pages}: SharpMetadata, size: number, path: string) {
	if (!format || !width || !height || (pages != null && pages > 1)) return undefined;
	const info: MediaInfo = {
		videoCodec: format,
		width,
		height,
		size,
		container: extensionOf(path).replace('jpeg', 'jpg'),
	};
	return info;
}

async function probeWithSharp(path: string) {
	const {default: sharp} = await import('sharp');
	// Disable all caching, otherwise sharp keeps files open and they can't be deleted
	sharp.cache(false);
	const [metadata, stat] = await Promise.all([sharp(path).metadata(), FSP.stat(path)]);
	return fromSharpMetadata(metadata, stat.size, path);
}

/**
 * Creates a probe. Photos go through sharp first, anything sharp can't read,
 * and all videos, through ffprobe. Without ffprobe, only sharp readable
 * photos produce info.
 */
export function makeProbe({ffprobePath, onError}: {ffprobePath?: string; onError?: (error: unknown) => void}): Probe {
	return async (path, kind) => {
		if (kind === 'photo') {
			// Unreadable by sharp falls through to ffprobe
			const info = await probeWithSharp(path).catch(() => undefined);
			if (info) return info;
		}

		if (!ffprobePath) return undefined;

		try {
			const info = fromProbedMeta(await ffprobe(path, {path: ffprobePath}));
			if (info.size == null) info.size = (await FSP.stat(path)).size;
			return info;
		} catch (error) {
			onError?.(error);
			return undefined;
		}
	};
}

/**
 * One line description for logs.
 * ```
 * // 'clip.mp4: 01:05 | h264/aac | 1920x1080 | 1.5 MB'
 * ```
 */
export function describeMedia(name: string, info: MediaInfo) {
	return `${name}: ${formatTime(info.duration)} | ${info.videoCodec ?? '-'}/${info.audioCodec ?? '-'} | ${
		info.width ?? '-'
	}x${info.height ?? '-'} | ${formatBytes(info.size)}`;
}
