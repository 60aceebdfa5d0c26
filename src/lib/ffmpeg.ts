import {spawn} from 'child_process';
import * as Readline from 'readline';
import type {Readable} from 'stream';
import {MAX_STDERR_SIZE} from '../config';
import type {Log} from '../types';
import type {ProgressParser, ProgressUpdate} from './progress';
import {MessageError, isErrnoException} from './utils';

/**
 * The part of `ChildProcess` the runner uses.
 */
export interface ChildProcessLike {
	stdout: Readable | null;
	stderr: Readable | null;
	kill(signal?: NodeJS.Signals | number): boolean;
	on(event: 'error', listener: (error: Error) => void): this;
	on(event: 'close', listener: (code: number | null) => void): this;
}

export type SpawnProcess = (command: string, args: string[], options: {cwd?: string}) => ChildProcessLike;

export class BinaryNotFoundError extends MessageError {
	constructor(public readonly path: string) {
		super(`Binary "${path}" not found. Point to an ffmpeg executable with --ffmpeg or FFMPEG_PATH.`);
	}
}

export class ProcessExitError extends MessageError {
	constructor(public readonly code: number | null, args: string[], public readonly stderr: string) {
		super(`Process exited with code ${code}.
Parameters:
----------
${args.map(argToParam).join(' ')}
----------
Stderr:
----------
${stderr}`);
	}
}

export class AbortError extends MessageError {
	constructor() {
		super(`Operation was cancelled.`);
	}
}

/**
 * Stderr lines worth forwarding into logs while encoding.
 */
export const isNotableStderrLine = (line: string) => /error|invalid|failed/i.test(line);

/**
 * Inserts machine readable progress reporting to stdout right after the
 * overwrite flag.
 * ```
 * withProgressArgs(['-y', '-i', 'a.mp4', 'b.mp4']);
 * // ['-y', '-progress', 'pipe:1', '-nostats', '-hide_banner', '-i', 'a.mp4', 'b.mp4']
 * ```
 */
export function withProgressArgs(args: string[]) {
	const progressArgs = ['-progress', 'pipe:1', '-nostats', '-hide_banner'];
	const [first, ...rest] = args;
	if (first === '-y' || first === '-n') return [first, ...progressArgs, ...rest];
	return [...progressArgs, ...args];
}

/**
 * Raw ffmpeg cli wrapper that provides progress and log reporting.
 */
export function runFFmpeg(
	ffmpegPath: string,
	args: string[],
	{
		parser,
		onProgress,
		onLog,
		signal,
		cwd,
		spawnProcess = spawn,
	}: {
		parser?: ProgressParser;
		onProgress?: (update: ProgressUpdate) => void;
		onLog?: Log;
		signal?: AbortSignal;
		cwd?: string;
		spawnProcess?: SpawnProcess;
	} = {}
) {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError());
			return;
		}

		const finalArgs = withProgressArgs(args);

		onLog?.(
			'info',
			`Executing ffmpeg with these parameters:
----------------------------------------
${finalArgs.map(argToParam).join(' ')}
----------------------------------------`
		);

		const cp = spawnProcess(ffmpegPath, finalArgs, {cwd});
		let stderr = '';
		let aborted = false;

		const abort = () => {
			aborted = true;
			cp.kill();
		};
		signal?.addEventListener('abort', abort);

		if (cp.stdout) {
			Readline.createInterface({input: cp.stdout}).on('line', (line) => {
				const update = parser?.feed(line);
				if (update) onProgress?.(update);
			});
		}

		if (cp.stderr) {
			Readline.createInterface({input: cp.stderr}).on('line', (line) => {
				stderr = `${stderr}${line}\n`.slice(-MAX_STDERR_SIZE);
				const trimmed = line.trim();
				if (trimmed && isNotableStderrLine(trimmed)) onLog?.('warn', trimmed);
			});
		}

		let done = (error?: Error | null, code?: number | null) => {
			done = () => {};
			signal?.removeEventListener('abort', abort);
			if (aborted) {
				reject(new AbortError());
			} else if (error) {
				reject(isErrnoException(error) && error.code === 'ENOENT' ? new BinaryNotFoundError(ffmpegPath) : error);
			} else if (code !== 0) {
				reject(new ProcessExitError(code ?? null, finalArgs, stderr.trim()));
			} else {
				resolve();
			}
		};

		cp.on('error', (error) => done(error));
		cp.on('close', (code) => done(null, code));
	});
}

/**
 * Quotes an argument for display in logs and error messages.
 * ```
 * argToParam('pipe:1'); // '"pipe:1"'
 * ```
 */
export function argToParam(value: string) {
	return value[0] === '-' ? value : value.match(/["'\/:\\\s\[\]]/) ? `"${value.replaceAll('"', '\\"')}"` : value;
}
