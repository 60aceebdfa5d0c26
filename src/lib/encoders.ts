import {spawn} from 'child_process';
import type {SpawnProcess} from './ffmpeg';
import type {Codec, CodecChoice, HardwareChoice, HardwareVendor} from '../config';
import type {Translate} from './i18n';
import type {Log} from '../types';

export type EncoderCaps = ReadonlySet<string>;

export interface SelectedEncoder {
	encoder: string;
	hardware: boolean;
}

type VideoCodec = Exclude<Codec, 'gif'>;

const HARDWARE_VENDORS: HardwareVendor[] = ['nvidia', 'intel', 'amd'];

const HARDWARE_ENCODERS: Record<HardwareVendor, Partial<Record<VideoCodec, string>>> = {
	nvidia: {h264: 'h264_nvenc', h265: 'hevc_nvenc', av1: 'av1_nvenc'},
	intel: {h264: 'h264_qsv', h265: 'hevc_qsv', av1: 'av1_qsv'},
	amd: {h264: 'h264_amf', h265: 'hevc_amf', av1: 'av1_amf'},
};

/** Encoders that need `-pix_fmt yuv420p` for widely playable output. */
const YUV420_ENCODERS = new Set([
	'libx264',
	'libx265',
	'h264_nvenc',
	'hevc_nvenc',
	'h264_qsv',
	'hevc_qsv',
	'h264_amf',
	'hevc_amf',
]);

export const needsYuv420 = (encoder: string) => YUV420_ENCODERS.has(encoder);

/** Encoders that take the x264 style `-preset` speed option. */
export const takesSpeedPreset = (encoder: string) => encoder === 'libx264' || encoder === 'libx265';

/**
 * Parses the output of `ffmpeg -encoders` into a set of encoder names.
 * Entries are listed after the legend's `------` separator:
 * ```
 *  V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC (codec h264)
 * ```
 */
export function parseEncoderList(stdout: string): Set<string> {
	const encoders = new Set<string>();
	let listing = false;

	for (const rawLine of stdout.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line.startsWith('--')) {
			listing = true;
			continue;
		}
		if (!listing || !line) continue;
		const name = line.split(/\s+/)[1];
		if (name) encoders.add(name);
	}

	return encoders;
}

/**
 * Asks ffmpeg for its encoders. Resolves with an empty set when that isn't
 * possible, in which case encoder selection doesn't check availability.
 */
export function detectEncoders(ffmpegPath: string, {spawnProcess = spawn}: {spawnProcess?: SpawnProcess} = {}) {
	return new Promise<Set<string>>((resolve) => {
		const cp = spawnProcess(ffmpegPath, ['-hide_banner', '-encoders'], {});
		let stdout = '';

		cp.stdout?.on('data', (data: Buffer) => {
			stdout += data.toString();
		});

		let done = (code: number | null) => {
			done = () => {};
			resolve(code === 0 ? parseEncoderList(stdout) : new Set());
		};

		cp.on('error', () => done(null));
		cp.on('close', (code) => done(code));
	});
}

/**
 * Short labels of notable encoder families available in `caps`.
 */
export function summarizeEncoders(caps: EncoderCaps): string[] {
	const hasAny = (...names: string[]) => names.some((name) => caps.has(name));
	const summary: string[] = [];
	if (hasAny('h264_nvenc', 'hevc_nvenc', 'av1_nvenc')) summary.push('NVENC');
	if (hasAny('h264_qsv', 'hevc_qsv', 'av1_qsv')) summary.push('QSV');
	if (hasAny('h264_amf', 'hevc_amf', 'av1_amf')) summary.push('AMF');
	if (hasAny('libx265')) summary.push('x265');
	if (hasAny('libsvtav1', 'libaom-av1')) summary.push('AV1');
	if (hasAny('libvpx-vp9')) summary.push('VP9');
	return summary;
}

/**
 * Resolves the user's codec choice against the output container.
 */
export function resolveCodec(
	extension: string,
	choice: CodecChoice,
	{log, t}: {log?: Log; t?: Translate} = {}
): Codec {
	extension = extension.replace(/^\./, '').toLowerCase();

	if (extension === 'gif') return 'gif';
	if (choice === 'auto') return extension === 'webm' ? 'vp9' : 'h264';

	if (extension === 'webm' && choice !== 'vp9' && choice !== 'av1') {
		if (t) log?.('warn', t('webmCodecFallback'));
		return 'vp9';
	}

	if (['mp4', 'mov', 'm4v', 'avi'].includes(extension) && choice === 'vp9') {
		if (t) log?.('warn', t('vp9ContainerFallback'));
		return 'h264';
	}

	return choice;
}

/**
 * Picks an encoder for a codec and hardware preference.
 *
 * When `caps` is empty (detection wasn't possible), software encoders are
 * assumed to exist, and hardware ones to not.
 */
export function selectEncoder(
	codec: Codec,
	hardware: HardwareChoice,
	caps: EncoderCaps,
	{log, t}: {log?: Log; t?: Translate} = {}
): SelectedEncoder {
	if (codec === 'gif') return {encoder: 'gif', hardware: false};

	const cpuEncoders: Record<VideoCodec, string> = {
		h264: 'libx264',
		h265: 'libx265',
		av1: caps.size === 0 || caps.has('libsvtav1') ? 'libsvtav1' : 'libaom-av1',
		vp9: 'libvpx-vp9',
	};

	const cpu = (): SelectedEncoder => {
		const encoder = cpuEncoders[codec];
		if (caps.size > 0 && !caps.has(encoder)) {
			if (t) log?.('warn', t('encoderMissing', {encoder}));
			return {encoder: 'libx264', hardware: false};
		}
		return {encoder, hardware: false};
	};

	if (hardware === 'cpu') return cpu();

	if (hardware === 'auto') {
		for (const vendor of HARDWARE_VENDORS) {
			const encoder = HARDWARE_ENCODERS[vendor][codec];
			if (encoder && caps.has(encoder)) return {encoder, hardware: true};
		}
		return cpu();
	}

	const encoder = HARDWARE_ENCODERS[hardware][codec];
	if (encoder && caps.has(encoder)) return {encoder, hardware: true};

	if (t) log?.('warn', t('hardwareEncoderMissing'));
	return cpu();
}

/**
 * Constant quality arguments in each encoder's dialect.
 */
export function encoderQualityArgs(encoder: string, crf: number): string[] {
	const value = `${crf}`;
	if (['libx264', 'libx265', 'libsvtav1', 'libaom-av1'].includes(encoder)) return ['-crf', value];
	if (encoder === 'libvpx-vp9') return ['-crf', value, '-b:v', '0'];
	if (encoder.endsWith('_nvenc')) return ['-rc:v', 'vbr', '-cq', value, '-b:v', '0'];
	if (encoder.endsWith('_qsv')) return ['-global_quality', value];
	if (encoder.endsWith('_amf')) return ['-rc', 'cqp', '-qp_i', value, '-qp_p', value, '-qp_b', value];
	return [];
}
