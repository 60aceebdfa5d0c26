export type LogLevel = 'info' | 'ok' | 'warn' | 'error';

export type Log = (level: LogLevel, message: string) => void;

/**
 * Region in pixels, `x` and `y` being the top left corner.
 */
export interface Region {
	x: number;
	y: number;
	width: number;
	height: number;
}
