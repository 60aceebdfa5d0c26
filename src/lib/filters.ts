import {PORTRAIT_MODES, POSITIONS, ROTATIONS, TEXT_POSITIONS} from '../config';
import type {ConversionSettings, MetadataSettings, TextSettings, WatermarkSettings} from '../options';
import {clamp} from './utils';

export type FilterSpec =
	| {type: 'none'}
	| {type: 'simple'; chain: string}
	| {type: 'complex'; graph: string; outputLabel: string; watermarkInput?: string};

/**
 * Escapes text for drawtext's `text='...'` value.
 */
export const escapeDrawtext = (text: string) =>
	text.replaceAll('\\', '\\\\').replaceAll(':', '\\:').replaceAll("'", "\\'");

/**
 * Escapes file paths used inside filter arguments. Windows drive colons have
 * to be escaped, and backslashes are turned into forward slashes.
 */
export const escapeFilterPath = (path: string) => path.replaceAll('\\', '/').replaceAll(':', '\\:');

/**
 * `scale=W:H`, missing side is `-1` (keep aspect ratio).
 */
export function makeScaleFilter(resize: ConversionSettings['resize']) {
	if (!resize || (resize.width == null && resize.height == null)) return undefined;
	return `scale=${resize.width ?? -1}:${resize.height ?? -1}`;
}

export function makeCropFilter(crop: ConversionSettings['crop']) {
	return crop ? `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}` : undefined;
}

const isSpeedChange = (speed: number | undefined): speed is number => speed != null && Math.abs(speed - 1) > 0.001;

/**
 * Splits speed into `atempo` factors, as each one only accepts 0.5 - 2.0.
 * ```
 * atempoChain(3); // [2, 1.5]
 * atempoChain(0.2); // [0.5, 0.5, 0.8]
 * ```
 */
export function atempoChain(speed: number): number[] {
	if (speed <= 0) return [];
	const factors: number[] = [];
	while (speed > 2) {
		factors.push(2);
		speed /= 2;
	}
	while (speed < 0.5) {
		factors.push(0.5);
		speed /= 0.5;
	}
	factors.push(speed);
	return factors;
}

export function makeAudioSpeedFilter(speed: number | undefined) {
	if (!isSpeedChange(speed)) return undefined;
	const factors = atempoChain(speed);
	return factors.length > 0 ? factors.map((factor) => `atempo=${factor.toFixed(3)}`).join(',') : undefined;
}

export function makeTextFilter(text: TextSettings | undefined) {
	if (!text?.text) return undefined;
	const {x, y} = TEXT_POSITIONS[text.position];
	let filter = `drawtext=text='${escapeDrawtext(text.text)}':x=${x}:y=${y}:fontsize=${text.size}:fontcolor=${
		text.color
	}`;
	if (text.font) filter += `:fontfile='${escapeFilterPath(text.font)}'`;
	if (text.box) {
		const opacity = clamp(0, text.boxOpacity, 100) / 100;
		filter += `:box=1:boxcolor=${text.boxColor}@${opacity.toFixed(2)}`;
	}
	return filter;
}

function makeWatermarkChain(watermark: WatermarkSettings, baseLabel: string) {
	const scale = Math.max(1, Math.trunc(watermark.scale)) / 100;
	const opacity = clamp(0, Math.trunc(watermark.opacity), 100) / 100;
	return [
		`[1:v]format=rgba,scale=iw*${scale}:ih*${scale},colorchannelmixer=aa=${opacity}[wm]`,
		`[${baseLabel}][wm]overlay=${POSITIONS[watermark.position]}[vout]`,
	];
}

/**
 * Filters shared by video and photo outputs, in application order.
 */
function makeCommonFilters(settings: ConversionSettings) {
	const filters: string[] = [];
	const scale = makeScaleFilter(settings.resize);
	const crop = makeCropFilter(settings.crop);
	const rotate = ROTATIONS[settings.rotate];
	if (scale) filters.push(scale);
	if (crop) filters.push(crop);
	if (rotate) filters.push(rotate);
	return filters;
}

/**
 * Builds the video filter graph.
 *
 * Without a watermark or portrait blur, everything fits into a simple `-vf`
 * chain. Those two need a second input or a split stream, and produce a
 * `-filter_complex` graph with `[vout]`/`[vbase]` as the output label.
 *
 * `watermark` is expected to point to an existing file, converter checks that.
 */
export function makeVideoFilterSpec(settings: ConversionSettings, outputExtension: string): FilterSpec {
	const filters = makeCommonFilters(settings);
	const isGif = outputExtension.replace(/^\./, '').toLowerCase() === 'gif';

	if (isSpeedChange(settings.speed)) filters.push(`setpts=PTS/${settings.speed}`);

	const text = makeTextFilter(settings.text);
	if (text) filters.push(text);

	const portrait = PORTRAIT_MODES[settings.portrait];
	let blurGraph: string | undefined;
	if (portrait) {
		const {width: w, height: h} = portrait;
		if (portrait.mode === 'crop') {
			filters.unshift(`scale='if(gt(a,9/16),-2,${w})':'if(gt(a,9/16),${h},-2)',crop=${w}:${h},setsar=1`);
		} else {
			blurGraph =
				`[0:v]scale=${w}:${h}:force_original_aspect_ratio=increase,boxblur=20:1,crop=${w}:${h}[bg];` +
				`[0:v]scale=${w}:${h}:force_original_aspect_ratio=decrease[fg];` +
				`[bg][fg]overlay=(W-w)/2:(H-h)/2,setsar=1`;
		}
	}

	if (isGif) {
		filters.push('fps=12');
		if (!makeScaleFilter(settings.resize)) filters.push('scale=640:-1:flags=lanczos');
	}

	const {watermark} = settings;

	if (!blurGraph && !watermark) {
		return filters.length > 0 ? {type: 'simple', chain: filters.join(',')} : {type: 'none'};
	}

	const baseLabel = 'vbase';
	const graph: string[] = [];

	if (blurGraph) {
		graph.push(`${blurGraph}${filters.length > 0 ? `,${filters.join(',')}` : ''}[${baseLabel}]`);
	} else {
		graph.push(`[0:v]${filters.length > 0 ? filters.join(',') : 'null'}[${baseLabel}]`);
	}

	if (!watermark) return {type: 'complex', graph: graph.join(';'), outputLabel: `[${baseLabel}]`};

	graph.push(...makeWatermarkChain(watermark, baseLabel));
	return {type: 'complex', graph: graph.join(';'), outputLabel: '[vout]', watermarkInput: watermark.path};
}

/**
 * Same as video, minus the time and portrait related filters.
 */
export function makePhotoFilterSpec(settings: ConversionSettings): FilterSpec {
	const filters = makeCommonFilters(settings);
	const text = makeTextFilter(settings.text);
	if (text) filters.push(text);

	const {watermark} = settings;
	if (!watermark) return filters.length > 0 ? {type: 'simple', chain: filters.join(',')} : {type: 'none'};

	const graph = [
		`[0:v]${filters.length > 0 ? filters.join(',') : 'null'}[vbase]`,
		...makeWatermarkChain(watermark, 'vbase'),
	];
	return {type: 'complex', graph: graph.join(';'), outputLabel: '[vout]', watermarkInput: watermark.path};
}

/**
 * Metadata arguments. Stripping wins over copying.
 */
export function makeMetadataArgs(metadata: MetadataSettings): string[] {
	const args: string[] = [];
	if (metadata.strip) args.push('-map_metadata', '-1');
	else if (metadata.copy) args.push('-map_metadata', '0');

	const tags: [string, string][] = [
		['title', metadata.title],
		['comment', metadata.comment],
		['artist', metadata.author],
		['copyright', metadata.copyright],
	];
	for (const [name, value] of tags) {
		if (value.trim()) args.push('-metadata', `${name}=${value.trim()}`);
	}

	return args;
}
