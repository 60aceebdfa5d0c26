import * as Path from 'path';
import * as OS from 'os';

export const IS_WIN = process.platform === 'win32';

export const VIDEO_EXTENSIONS = new Set(['mov', 'mp4', 'mkv', 'webm', 'avi', 'm4v', 'flv', 'wmv', 'mts', 'm2ts']);
export const PHOTO_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'webp', 'bmp', 'tif', 'tiff', 'heic', 'heif']);

export const VIDEO_FORMATS = ['mp4', 'mkv', 'webm', 'mov', 'avi', 'gif'] as const;
export const PHOTO_FORMATS = ['jpg', 'png', 'webp', 'bmp', 'tiff'] as const;
export type VideoFormat = (typeof VIDEO_FORMATS)[number];
export type PhotoFormat = (typeof PHOTO_FORMATS)[number];

/** libx264/libx265 speed presets. */
export const ENCODER_PRESETS = [
	'ultrafast',
	'superfast',
	'veryfast',
	'faster',
	'fast',
	'medium',
	'slow',
	'slower',
	'veryslow',
] as const;
export type EncoderPreset = (typeof ENCODER_PRESETS)[number];

export const CODECS = ['auto', 'h264', 'h265', 'av1', 'vp9'] as const;
export type CodecChoice = (typeof CODECS)[number];
export type Codec = Exclude<CodecChoice, 'auto'> | 'gif';

export const HARDWARE = ['auto', 'cpu', 'nvidia', 'intel', 'amd'] as const;
export type HardwareChoice = (typeof HARDWARE)[number];
export type HardwareVendor = Exclude<HardwareChoice, 'auto' | 'cpu'>;

/**
 * Vertical 9:16 output. `crop` fills the frame by cutting the sides off,
 * `blur` fits the whole frame over a blurred, zoomed-in copy of itself.
 */
export const PORTRAIT_MODES = {
	off: null,
	'1080x1920-crop': {mode: 'crop', width: 1080, height: 1920},
	'1080x1920-blur': {mode: 'blur', width: 1080, height: 1920},
	'720x1280-crop': {mode: 'crop', width: 720, height: 1280},
	'720x1280-blur': {mode: 'blur', width: 720, height: 1280},
} as const;
export type PortraitMode = keyof typeof PORTRAIT_MODES;

export const ROTATIONS = {
	'0': null,
	'90cw': 'transpose=1',
	'90ccw': 'transpose=2',
	'180': 'transpose=1,transpose=1',
} as const;
export type Rotation = keyof typeof ROTATIONS;

/**
 * Overlay coordinates for each position. `w`/`h` is the overlaid image size,
 * text positions swap them for drawtext's `tw`/`th`.
 */
export const POSITIONS = {
	'top-left': '10:10',
	'top-right': 'W-w-10:10',
	'bottom-left': '10:H-h-10',
	'bottom-right': 'W-w-10:H-h-10',
	center: '(W-w)/2:(H-h)/2',
} as const;
export type Position = keyof typeof POSITIONS;

export const TEXT_POSITIONS: Record<Position, {x: string; y: string}> = {
	'top-left': {x: '10', y: '10'},
	'top-right': {x: 'W-tw-10', y: '10'},
	'bottom-left': {x: '10', y: 'H-th-10'},
	'bottom-right': {x: 'W-tw-10', y: 'H-th-10'},
	center: {x: '(W-tw)/2', y: '(H-th)/2'},
};

export const LANGUAGES = ['uk', 'ru', 'en', 'pt'] as const;
export type Language = (typeof LANGUAGES)[number];

export const THEME_NAMES = ['light', 'dark', 'custom'] as const;
export type ThemeName = (typeof THEME_NAMES)[number];

/** Lines kept in session log and stderr tails. */
export const MAX_LOG_LINES = 500;
export const MAX_STDERR_SIZE = 100000;

/**
 * Directory with presets and preferences.
 */
export function getStorageDirectory(env: NodeJS.ProcessEnv = process.env) {
	const override = env.MEDIA_CONVERTER_HOME?.trim();
	return override ? Path.resolve(override) : Path.join(OS.homedir(), '.media-batch-converter');
}

export const getPresetsPath = (env?: NodeJS.ProcessEnv) => Path.join(getStorageDirectory(env), 'presets.json');
export const getPreferencesPath = (env?: NodeJS.ProcessEnv) => Path.join(getStorageDirectory(env), 'preferences.json');

export const DEFAULT_OUTPUT_DIRECTORY = Path.join(OS.homedir(), 'Videos', 'converted');
