/**
 * Extract error message.
 */
export function eem(error: unknown, preferStack = false) {
	return error instanceof Error ? (preferStack ? error.stack || error.message : error.message) : `${error}`;
}

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && 'code' in error;

/**
 * Constructor to be used for errors that should only display a message without
 * a stack to the user.
 */
export class MessageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * '1:30:40.500' => {milliseconds}
 */
export function isoTimeToMS(text: string) {
	const [whole = '', fraction] = text.split('.');
	let time = fraction ? parseFloat(`.${fraction}`) * 1000 : 0;
	const parts = whole
		.split(':')
		.filter((x) => x)
		.map((x) => parseInt(x, 10));

	const seconds = parts.pop();
	const minutes = parts.pop();
	const hours = parts.pop();
	if (seconds != null) time += seconds * 1000;
	if (minutes != null) time += minutes * 1000 * 60;
	if (hours != null) time += hours * 1000 * 60 * 60;

	return time;
}

/**
 * Parses user entered time into milliseconds.
 * ```
 * parseTime('90'); // 90000
 * parseTime('1:30.5'); // 90500
 * parseTime('01:00:00'); // 3600000
 * parseTime('soon'); // undefined
 * ```
 */
export function parseTime(text: string): number | undefined {
	const raw = text.trim();
	if (!/^(\d+:){0,2}\d+(\.\d+)?$/.test(raw)) return undefined;
	return isoTimeToMS(raw);
}

/**
 * Short clock time for progress texts, hours only when needed.
 * ```
 * formatTime(65000); // '01:05'
 * formatTime(3725000); // '01:02:05'
 * formatTime(undefined); // '--:--'
 * ```
 */
export function formatTime(milliseconds: number | null | undefined) {
	if (milliseconds == null || !Number.isFinite(milliseconds) || milliseconds < 0) return '--:--';
	const total = Math.round(milliseconds / 1000);
	const hours = Math.floor(total / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	const seconds = total % 60;
	const pad = (value: number) => String(value).padStart(2, '0');
	return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Formats raw size number into human readable units.
 * ```
 * formatBytes(1536); // '1.5 KB'
 * ```
 */
export function formatBytes(bytes: number | null | undefined): string {
	if (bytes == null) return '--';
	let value = bytes;
	for (const unit of sizeUnits) {
		if (value < 1024) return `${value.toFixed(1)} ${unit}`;
		value /= 1024;
	}
	return `${value.toFixed(1)} PB`;
}
const sizeUnits = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format floating point number into percentage string.
 */
export function numberToPercent(value: number) {
	return `${(value * 100).toFixed(Math.abs(value) > 0.01 ? 0 : 1)}%`;
}

/**
 * Strict integer parsing for form fields. Empty or invalid input is `undefined`.
 */
export function parseInteger(text: string): number | undefined {
	const raw = text.trim();
	return /^[+-]?\d+$/.test(raw) ? parseInt(raw, 10) : undefined;
}

/**
 * Strict float parsing for form fields. Empty or invalid input is `undefined`.
 */
export function parseDecimal(text: string): number | undefined {
	const raw = text.trim();
	if (raw.length === 0) return undefined;
	const value = Number(raw);
	return Number.isFinite(value) ? value : undefined;
}

/**
 * Generate unique ID.
 */
export const uid = (size = 10) =>
	Array(size)
		.fill(0)
		.map(() => Math.floor(Math.random() * 36).toString(36))
		.join('');

/**
 * CLamp a number between 2 other numbers.
 */
export const clamp = (min: number, value: number, max: number) => Math.max(min, Math.min(max, value));
