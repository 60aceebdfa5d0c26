import type {JsonPrimitive} from 'type-fest';
import {
	CODECS,
	CodecChoice,
	ENCODER_PRESETS,
	EncoderPreset,
	HARDWARE,
	HardwareChoice,
	PHOTO_FORMATS,
	PORTRAIT_MODES,
	POSITIONS,
	PhotoFormat,
	PortraitMode,
	Position,
	ROTATIONS,
	Rotation,
	VIDEO_FORMATS,
	VideoFormat,
} from './config';
import type {Translate} from './lib/i18n';
import {clamp, parseDecimal, parseInteger, parseTime} from './lib/utils';
import type {Log, Region} from './types';

/**
 * Types & schemas.
 */

/**
 * Raw form state, as edited by the user and stored in presets. Free-text
 * numeric fields are strings, empty meaning "not set".
 */
export interface FormValues {
	videoFormat: VideoFormat;
	photoFormat: PhotoFormat;
	crf: number;
	preset: EncoderPreset;
	portrait: PortraitMode;
	photoQuality: number;
	overwrite: boolean;
	fastCopy: boolean;

	trimStart: string;
	trimEnd: string;
	merge: boolean;
	mergeName: string;

	resizeWidth: string;
	resizeHeight: string;
	cropWidth: string;
	cropHeight: string;
	cropX: string;
	cropY: string;
	rotate: Rotation;
	speed: string;

	watermarkPath: string;
	watermarkPosition: Position;
	watermarkOpacity: number;
	watermarkScale: number;

	text: string;
	textPosition: Position;
	textSize: number;
	textColor: string;
	textBox: boolean;
	textBoxColor: string;
	textBoxOpacity: number;
	textFont: string;

	codec: CodecChoice;
	hardware: HardwareChoice;

	stripMetadata: boolean;
	copyMetadata: boolean;
	metaTitle: string;
	metaComment: string;
	metaAuthor: string;
	metaCopyright: string;
}

export type OptionName = keyof FormValues;

export type OptionMeta<V> = [V] extends [boolean]
	? {type: 'boolean'; title: string; description?: string}
	: [V] extends [number]
	? {type: 'number'; title: string; description?: string; min: number; max: number; integer?: boolean}
	: string extends V
	? {type: 'string'; title: string; description?: string}
	: {type: 'select'; title: string; description?: string; options: readonly V[]};

export type AnyOptionMeta =
	| OptionMeta<boolean>
	| OptionMeta<number>
	| OptionMeta<string>
	| {type: 'select'; title: string; description?: string; options: readonly string[]};

export type OptionsSchema = {[K in OptionName]: OptionMeta<FormValues[K]>};

/**
 * Preset is any subset of form values.
 */
export type PresetValues = Partial<FormValues>;

const keysOf = <T extends object>(object: T) =>
	Object.keys(object).filter((key): key is Extract<keyof T, string> => key in object);

export const DEFAULT_FORM_VALUES: Readonly<FormValues> = {
	videoFormat: 'mp4',
	photoFormat: 'jpg',
	crf: 23,
	preset: 'medium',
	portrait: 'off',
	photoQuality: 90,
	overwrite: false,
	fastCopy: false,

	trimStart: '',
	trimEnd: '',
	merge: false,
	mergeName: 'merged',

	resizeWidth: '',
	resizeHeight: '',
	cropWidth: '',
	cropHeight: '',
	cropX: '',
	cropY: '',
	rotate: '0',
	speed: '',

	watermarkPath: '',
	watermarkPosition: 'bottom-right',
	watermarkOpacity: 80,
	watermarkScale: 30,

	text: '',
	textPosition: 'bottom-right',
	textSize: 24,
	textColor: 'white',
	textBox: false,
	textBoxColor: 'black',
	textBoxOpacity: 50,
	textFont: '',

	codec: 'auto',
	hardware: 'auto',

	stripMetadata: false,
	copyMetadata: false,
	metaTitle: '',
	metaComment: '',
	metaAuthor: '',
	metaCopyright: '',
};

// Options schema for the FormValues type above
export const optionsSchema: OptionsSchema = {
	videoFormat: {type: 'select', options: VIDEO_FORMATS, title: 'Video format'},
	photoFormat: {type: 'select', options: PHOTO_FORMATS, title: 'Photo format'},
	crf: {
		type: 'number',
		min: 0,
		max: 63,
		integer: true,
		title: 'CRF',
		description: `Constant quality rate factor. Lower is better quality and a bigger file. Used as CQ/QP by hardware encoders.`,
	},
	preset: {
		type: 'select',
		options: ENCODER_PRESETS,
		title: 'Preset',
		description: `Encoder speed preset, only used by libx264 and libx265.`,
	},
	portrait: {type: 'select', options: keysOf(PORTRAIT_MODES), title: 'Portrait 9:16'},
	photoQuality: {type: 'number', min: 1, max: 100, integer: true, title: 'Photo quality'},
	overwrite: {type: 'boolean', title: 'Overwrite', description: `Replace existing files instead of numbering.`},
	fastCopy: {
		type: 'boolean',
		title: 'Fast copy',
		description: `Copy streams into the new container without re-encoding, when the format allows it.`,
	},

	trimStart: {type: 'string', title: 'Trim start', description: `Seconds, MM:SS, or HH:MM:SS.`},
	trimEnd: {type: 'string', title: 'Trim end', description: `Seconds, MM:SS, or HH:MM:SS.`},
	merge: {type: 'boolean', title: 'Merge', description: `Concatenate all queued videos into one file.`},
	mergeName: {type: 'string', title: 'Merge file name'},

	resizeWidth: {type: 'string', title: 'Resize width'},
	resizeHeight: {type: 'string', title: 'Resize height'},
	cropWidth: {type: 'string', title: 'Crop width'},
	cropHeight: {type: 'string', title: 'Crop height'},
	cropX: {type: 'string', title: 'Crop X'},
	cropY: {type: 'string', title: 'Crop Y'},
	rotate: {type: 'select', options: keysOf(ROTATIONS), title: 'Rotate'},
	speed: {type: 'string', title: 'Speed', description: `Playback speed multiplier, e.g. 2 or 0.5.`},

	watermarkPath: {type: 'string', title: 'Watermark image'},
	watermarkPosition: {type: 'select', options: keysOf(POSITIONS), title: 'Watermark position'},
	watermarkOpacity: {type: 'number', min: 0, max: 100, integer: true, title: 'Watermark opacity'},
	watermarkScale: {type: 'number', min: 1, max: 100, integer: true, title: 'Watermark scale'},

	text: {type: 'string', title: 'Text watermark'},
	textPosition: {type: 'select', options: keysOf(POSITIONS), title: 'Text position'},
	textSize: {type: 'number', min: 1, max: 500, integer: true, title: 'Text size'},
	textColor: {type: 'string', title: 'Text color'},
	textBox: {type: 'boolean', title: 'Text box'},
	textBoxColor: {type: 'string', title: 'Text box color'},
	textBoxOpacity: {type: 'number', min: 0, max: 100, integer: true, title: 'Text box opacity'},
	textFont: {type: 'string', title: 'Font file'},

	codec: {type: 'select', options: CODECS, title: 'Codec'},
	hardware: {
		type: 'select',
		options: HARDWARE,
		title: 'Hardware encoder',
		description: `<b>auto</b> uses the first available GPU encoder, <b>cpu</b> never uses one.`,
	},

	stripMetadata: {type: 'boolean', title: 'Strip metadata'},
	copyMetadata: {type: 'boolean', title: 'Copy metadata'},
	metaTitle: {type: 'string', title: 'Title'},
	metaComment: {type: 'string', title: 'Comment'},
	metaAuthor: {type: 'string', title: 'Author'},
	metaCopyright: {type: 'string', title: 'Copyright'},
};

export const OPTION_NAMES: OptionName[] = keysOf(optionsSchema);

export const isOptionName = (value: string): value is OptionName => Object.hasOwn(optionsSchema, value);

export const makeDefaultFormValues = (): FormValues => ({...DEFAULT_FORM_VALUES});

/**
 * Checks the value fits the option's schema exactly.
 */
export function isFormValue<K extends OptionName>(name: K, value: unknown): value is FormValues[K] {
	const optionName: OptionName = name;
	const option: AnyOptionMeta = optionsSchema[optionName];

	switch (option.type) {
		case 'boolean':
			return typeof value === 'boolean';
		case 'number':
			return (
				typeof value === 'number' &&
				Number.isFinite(value) &&
				value >= option.min &&
				value <= option.max &&
				(!option.integer || Number.isInteger(value))
			);
		case 'string':
			return typeof value === 'string';
		case 'select':
			return typeof value === 'string' && option.options.includes(value);
	}
}

/**
 * Loosely converts a stored or command line value towards the option's type.
 * Result still has to pass `isFormValue()`.
 */
export function normalizeFormValue(name: OptionName, value: unknown): unknown {
	const option: AnyOptionMeta = optionsSchema[name];

	switch (option.type) {
		case 'boolean':
			if (typeof value === 'string') {
				const lower = value.trim().toLowerCase();
				if (['true', '1', 'yes', 'on'].includes(lower)) return true;
				if (['false', '0', 'no', 'off', ''].includes(lower)) return false;
			}
			return typeof value === 'number' ? value !== 0 : value;
		case 'number': {
			const number = typeof value === 'string' ? parseDecimal(value) : value;
			if (typeof number !== 'number' || !Number.isFinite(number)) return value;
			return clamp(option.min, option.integer ? Math.round(number) : number, option.max);
		}
		case 'string':
			return typeof value === 'number' ? `${value}` : value;
		case 'select':
			return typeof value === 'number' ? `${value}` : value;
	}
}

function assignValue<K extends OptionName>(target: PresetValues, name: K, value: unknown) {
	const normalized = normalizeFormValue(name, value);
	if (!isFormValue(name, normalized)) return false;
	target[name] = normalized;
	return true;
}

/**
 * Validates an untrusted map (preset file, command line) into form values.
 * Unknown names and invalid values are left out and reported.
 */
export function coerceFormValues(
	raw: Record<string, unknown>,
	onInvalid?: (name: string, value: unknown) => void
): PresetValues {
	const result: PresetValues = {};

	for (const [name, value] of Object.entries(raw)) {
		if (!isOptionName(name) || !assignValue(result, name, value)) onInvalid?.(name, value);
	}

	return result;
}

/**
 * Populates the form with the fields the preset defines, the rest stays.
 */
export function applyPreset(form: FormValues, preset: PresetValues): FormValues {
	return {...form, ...coerceFormValues(preset)};
}

/**
 * Defined values in a shape that can be stored as JSON.
 */
export function serializeFormValues(form: PresetValues): Record<string, JsonPrimitive> {
	const result: Record<string, JsonPrimitive> = {};
	for (const name of OPTION_NAMES) {
		const value = form[name];
		if (value !== undefined) result[name] = value;
	}
	return result;
}

/**
 * Typed, parsed conversion settings.
 */
export interface ConversionSettings {
	videoFormat: VideoFormat;
	photoFormat: PhotoFormat;
	crf: number;
	preset: EncoderPreset;
	portrait: PortraitMode;
	photoQuality: number;
	overwrite: boolean;
	fastCopy: boolean;

	/** Milliseconds. */
	trimStart?: number;
	/** Milliseconds. */
	trimEnd?: number;
	merge: boolean;
	mergeName: string;

	resize?: {width?: number; height?: number};
	crop?: Region;
	rotate: Rotation;
	speed?: number;

	watermark?: WatermarkSettings;
	text?: TextSettings;

	codec: CodecChoice;
	hardware: HardwareChoice;
	metadata: MetadataSettings;
}

export interface WatermarkSettings {
	path: string;
	position: Position;
	/** 0-100 */
	opacity: number;
	/** Percent of the watermark's own size, 1-100. */
	scale: number;
}

export interface TextSettings {
	text: string;
	position: Position;
	size: number;
	color: string;
	box: boolean;
	boxColor: string;
	/** 0-100 */
	boxOpacity: number;
	font?: string;
}

export interface MetadataSettings {
	strip: boolean;
	copy: boolean;
	title: string;
	comment: string;
	author: string;
	copyright: string;
}

/**
 * Parses form values into conversion settings. Invalid non-empty numeric
 * fields are reported and ignored.
 */
export function resolveSettings(form: FormValues, {log, t}: {log: Log; t: Translate}): ConversionSettings {
	const parse = <T>(field: OptionName, raw: string, parser: (value: string) => T | undefined): T | undefined => {
		const value = parser(raw);
		if (value === undefined && raw.trim()) {
			log('warn', t('invalidField', {field: optionsSchema[field].title, value: raw.trim()}));
		}
		return value;
	};

	const resizeWidth = parse('resizeWidth', form.resizeWidth, parseInteger);
	const resizeHeight = parse('resizeHeight', form.resizeHeight, parseInteger);
	const cropWidth = parse('cropWidth', form.cropWidth, parseInteger);
	const cropHeight = parse('cropHeight', form.cropHeight, parseInteger);
	const cropX = parse('cropX', form.cropX, parseInteger) ?? 0;
	const cropY = parse('cropY', form.cropY, parseInteger) ?? 0;
	let speed = parse('speed', form.speed, parseDecimal);
	if (speed != null && speed <= 0) {
		log('warn', t('invalidField', {field: optionsSchema.speed.title, value: form.speed.trim()}));
		speed = undefined;
	}

	const watermarkPath = form.watermarkPath.trim();
	const text = form.text.trim();
	const font = form.textFont.trim();

	return {
		videoFormat: form.videoFormat,
		photoFormat: form.photoFormat,
		crf: form.crf,
		preset: form.preset,
		portrait: form.portrait,
		photoQuality: form.photoQuality,
		overwrite: form.overwrite,
		fastCopy: form.fastCopy,

		trimStart: parse('trimStart', form.trimStart, parseTime),
		trimEnd: parse('trimEnd', form.trimEnd, parseTime),
		merge: form.merge,
		mergeName: form.mergeName.trim() || DEFAULT_FORM_VALUES.mergeName,

		resize: resizeWidth != null || resizeHeight != null ? {width: resizeWidth, height: resizeHeight} : undefined,
		crop:
			cropWidth != null && cropHeight != null
				? {width: cropWidth, height: cropHeight, x: cropX, y: cropY}
				: undefined,
		rotate: form.rotate,
		speed,

		watermark: watermarkPath
			? {
					path: watermarkPath,
					position: form.watermarkPosition,
					opacity: form.watermarkOpacity,
					scale: form.watermarkScale,
			  }
			: undefined,
		text: text
			? {
					text,
					position: form.textPosition,
					size: form.textSize,
					color: form.textColor.trim() || DEFAULT_FORM_VALUES.textColor,
					box: form.textBox,
					boxColor: form.textBoxColor.trim() || DEFAULT_FORM_VALUES.textBoxColor,
					boxOpacity: form.textBoxOpacity,
					font: font || undefined,
			  }
			: undefined,

		codec: form.codec,
		hardware: form.hardware,
		metadata: {
			strip: form.stripMetadata,
			copy: form.copyMetadata,
			title: form.metaTitle.trim(),
			comment: form.metaComment.trim(),
			author: form.metaAuthor.trim(),
			copyright: form.metaCopyright.trim(),
		},
	};
}
