import {promises as FSP} from 'fs';
import * as Path from 'path';
import {DEFAULT_OUTPUT_DIRECTORY, Language, THEME_NAMES, ThemeName} from '../config';
import {isLanguage} from './i18n';
import {Palette, isHexColor, isPaletteKey} from './themes';
import {eem, isErrnoException} from './utils';

export interface Preferences {
	theme: ThemeName;
	/** Colors layered over the light theme when `theme` is `custom`. */
	customColors: Partial<Palette>;
	/** Accent override for any theme, empty for the theme's own. */
	accent: string;
	language: Language;
	/** Empty for auto-detection. */
	ffmpegPath: string;
	outputDirectory: string;
}

export const DEFAULT_PREFERENCES: Readonly<Preferences> = {
	theme: 'light',
	customColors: {},
	accent: '',
	language: 'en',
	ffmpegPath: '',
	outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
};

const isThemeName = (value: unknown): value is ThemeName =>
	typeof value === 'string' && THEME_NAMES.some((name) => name === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	value != null && typeof value === 'object' && !Array.isArray(value);

/**
 * Takes whatever valid fields an untrusted object has, defaults for the rest.
 */
export function coercePreferences(raw: unknown): Preferences {
	const preferences: Preferences = {...DEFAULT_PREFERENCES, customColors: {}};
	if (!isRecord(raw)) return preferences;

	if (isThemeName(raw.theme)) preferences.theme = raw.theme;
	if (isLanguage(raw.language)) preferences.language = raw.language;
	if (raw.accent === '' || isHexColor(raw.accent)) preferences.accent = raw.accent;
	if (typeof raw.ffmpegPath === 'string') preferences.ffmpegPath = raw.ffmpegPath.trim();
	if (typeof raw.outputDirectory === 'string' && raw.outputDirectory.trim()) {
		preferences.outputDirectory = raw.outputDirectory.trim();
	}

	if (isRecord(raw.customColors)) {
		for (const [key, value] of Object.entries(raw.customColors)) {
			if (isPaletteKey(key) && isHexColor(value)) preferences.customColors[key] = value;
		}
	}

	return preferences;
}

/**
 * Missing file yields defaults, malformed one too, reported through `onInvalid`.
 */
export async function loadPreferences(
	path: string,
	{onInvalid}: {onInvalid?: (message: string) => void} = {}
): Promise<Preferences> {
	let json: string;

	try {
		json = await FSP.readFile(path, 'utf8');
	} catch (error) {
		if (!isErrnoException(error) || error.code !== 'ENOENT') {
			onInvalid?.(`Preferences file couldn't be read: ${eem(error)}`);
		}
		return coercePreferences(undefined);
	}

	try {
		return coercePreferences(JSON.parse(json));
	} catch (error) {
		onInvalid?.(`Preferences file is malformed: ${eem(error)}`);
		return coercePreferences(undefined);
	}
}

export async function savePreferences(path: string, preferences: Preferences) {
	await FSP.mkdir(Path.dirname(path), {recursive: true});
	await FSP.writeFile(path, `${JSON.stringify(preferences, null, 2)}\n`, 'utf8');
}
