import {isoTimeToMS} from './utils';

export interface FileProgress {
	/** 0-1, `undefined` when the file duration isn't known. */
	fraction?: number;
	/** Milliseconds of output written so far. */
	outTime: number;
	/** Milliseconds. */
	duration?: number;
	/** Milliseconds. */
	eta?: number;
	/** Encoding speed multiplier, e.g. `1.5` for `speed=1.5x`. */
	speed?: number;
}

export interface TotalProgress {
	/** 0-1 */
	fraction: number;
	/** Milliseconds. */
	eta?: number;
}

export interface ProgressUpdate {
	file: FileProgress;
	total: TotalProgress;
}

/**
 * Batch-level numbers the overall progress is computed from.
 * Durations are in milliseconds.
 */
export interface BatchState {
	doneFiles: number;
	totalFiles: number;
	doneDuration: number;
	totalDuration: number;
	/** Timestamp of when the batch started. */
	startedAt: number;
}

export type Clock = () => number;

/**
 * Time left, extrapolated from time elapsed and fraction done.
 */
export function estimateEta(elapsed: number, fraction: number) {
	if (!(fraction > 0)) return undefined;
	return Math.max(elapsed / fraction - elapsed, 0);
}

/**
 * Parses `-progress` line values. Returns `undefined` for unusable values.
 * ```
 * parseProgressTime('out_time_us', '1500000'); // 1500
 * parseProgressTime('out_time', '00:00:01.500000'); // 1500
 * ```
 */
export function parseProgressTime(key: string, value: string): number | undefined {
	value = value.trim();
	if (!value) return undefined;
	switch (key) {
		// Both are microseconds, out_time_ms is misnamed in ffmpeg
		case 'out_time_us':
		case 'out_time_ms':
			return /^-?\d+$/.test(value) ? Number(value) / 1000 : undefined;
		case 'out_time':
			if (/^\d+(\.\d+)?$/.test(value)) return Number(value) * 1000;
			if (/^\d+:\d+:\d+(\.\d+)?$/.test(value)) return isoTimeToMS(value);
			return undefined;
	}
	return undefined;
}

/**
 * `speed=1.5x` value into a number. `N/A` and garbage are `undefined`.
 */
export function parseSpeed(value: string): number | undefined {
	const raw = value.trim().replace(/x$/, '');
	if (!raw || !/^\d+(\.\d+)?(e[+-]?\d+)?$/i.test(raw)) return undefined;
	const speed = Number(raw);
	return Number.isFinite(speed) ? speed : undefined;
}

/**
 * Turns ffmpeg's `-progress` key=value lines for one file into file and
 * overall progress. Create one per ffmpeg run.
 */
export class ProgressParser {
	outTime = 0;
	speed?: number;
	readonly startedAt: number;

	constructor(
		/** Duration of the file being encoded in milliseconds, if known. */
		public readonly duration: number | undefined,
		public readonly batch: BatchState,
		private readonly now: Clock = Date.now
	) {
		this.startedAt = now();
	}

	/**
	 * Feeds one line. Returns a progress update for every `key=value` line,
	 * `undefined` for lines that aren't one.
	 */
	feed(rawLine: string): ProgressUpdate | undefined {
		const line = rawLine.trim();
		const delimiterIndex = line.indexOf('=');
		if (!line || delimiterIndex < 1) return undefined;

		const key = line.slice(0, delimiterIndex).trim();
		const value = line.slice(delimiterIndex + 1);

		if (key === 'speed') {
			const speed = parseSpeed(value);
			if (speed != null) this.speed = speed;
		} else {
			const time = parseProgressTime(key, value);
			if (time != null && time >= 0) this.outTime = time;
		}

		return this.snapshot();
	}

	snapshot(): ProgressUpdate {
		const {duration, outTime, speed, batch} = this;
		const now = this.now();
		const file: FileProgress = {outTime, duration, speed};

		if (duration != null && duration > 0) {
			file.fraction = Math.min(outTime / duration, 1);
			if (speed != null && speed > 0) {
				file.eta = Math.max((duration - outTime) / speed, 0);
			} else {
				file.eta = estimateEta(Math.max(now - this.startedAt, 1), file.fraction);
			}
		}

		const fraction =
			batch.totalDuration > 0
				? Math.min((batch.doneDuration + outTime) / batch.totalDuration, 1)
				: (batch.doneFiles + (file.fraction ?? 0)) / Math.max(batch.totalFiles, 1);

		return {file, total: {fraction, eta: estimateEta(now - batch.startedAt, fraction)}};
	}
}

/**
 * Whole percent, zero padded to 2 digits: `0.05` => `'05%'`.
 */
export const formatPercent = (fraction: number) => `${`${Math.trunc(fraction * 100)}`.padStart(2, '0')}%`;
