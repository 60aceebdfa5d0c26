import type {ThemeName} from '../config';

export interface Palette {
	bg: string;
	panel: string;
	text: string;
	muted: string;
	accent: string;
	accentAlt: string;
	border: string;
	success: string;
	warn: string;
	error: string;
}

export type PaletteKey = keyof Palette;

export const THEMES: Record<Exclude<ThemeName, 'custom'>, Readonly<Palette>> = {
	light: {
		bg: '#F9FAFB',
		panel: '#FFFFFF',
		text: '#111827',
		muted: '#6B7280',
		accent: '#2563EB',
		accentAlt: '#1D4ED8',
		border: '#E5E7EB',
		success: '#0F766E',
		warn: '#B45309',
		error: '#B91C1C',
	},
	dark: {
		bg: '#0F172A',
		panel: '#111827',
		text: '#F8FAFC',
		muted: '#94A3B8',
		accent: '#3B82F6',
		accentAlt: '#2563EB',
		border: '#1F2937',
		success: '#34D399',
		warn: '#FBBF24',
		error: '#F87171',
	},
};

export const PALETTE_KEYS: PaletteKey[] = [
	'bg',
	'panel',
	'text',
	'muted',
	'accent',
	'accentAlt',
	'border',
	'success',
	'warn',
	'error',
];

export const isPaletteKey = (value: string): value is PaletteKey => PALETTE_KEYS.some((key) => key === value);

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export const isHexColor = (value: unknown): value is string => typeof value === 'string' && HEX_COLOR.test(value);

/**
 * Resolves the palette for a theme. Custom colors are layered over light,
 * and accent, when set, overrides the theme's own.
 */
export function resolveTheme(
	name: ThemeName,
	{custom = {}, accent}: {custom?: Partial<Palette>; accent?: string} = {}
): Palette {
	const palette: Palette = name === 'custom' ? {...THEMES.light, ...custom} : {...THEMES[name]};
	if (accent && isHexColor(accent)) palette.accent = accent;
	return palette;
}

/**
 * `#RRGGBB` or `#RGB` into an ANSI 24-bit foreground color escape.
 */
export function ansiForeground(hex: string) {
	let digits = hex.replace(/^#/, '');
	if (digits.length === 3) digits = [...digits].map((digit) => digit + digit).join('');
	const [r, g, b] = [0, 2, 4].map((index) => parseInt(digits.slice(index, index + 2), 16));
	return `\x1b[38;2;${r};${g};${b}m`;
}

export const ANSI_RESET = '\x1b[0m';
