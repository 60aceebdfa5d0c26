import {promises as FSP} from 'fs';
import * as Path from 'path';
import {IS_WIN} from '../config';

/**
 * Directory of this package, where bundled binaries can be placed directly
 * or in its `bin/`.
 */
export const PACKAGE_DIRECTORY = Path.resolve(__dirname, '..', '..');

export interface LookupOptions {
	env?: NodeJS.ProcessEnv;
	packageDirectory?: string;
	isWin?: boolean;
}

export const executableName = (name: string, isWin = IS_WIN) => (isWin ? `${name}.exe` : name);

async function isFile(path: string) {
	try {
		return (await FSP.stat(path)).isFile();
	} catch {
		return false;
	}
}

async function firstFile(candidates: string[]) {
	for (const candidate of candidates) {
		if (await isFile(candidate)) return candidate;
	}
	return undefined;
}

/**
 * Looks for an executable in the directories of the `PATH` environment variable.
 */
export function findInPath(name: string, {env = process.env, isWin = IS_WIN}: LookupOptions = {}) {
	const directories = (env.PATH ?? env.Path ?? '').split(Path.delimiter).filter((directory) => directory.trim());
	return firstFile(directories.map((directory) => Path.join(directory, executableName(name, isWin))));
}

function packageCandidates(name: string, {packageDirectory = PACKAGE_DIRECTORY, isWin = IS_WIN}: LookupOptions) {
	const file = executableName(name, isWin);
	return [Path.join(packageDirectory, file), Path.join(packageDirectory, 'bin', file)];
}

/**
 * Finds ffmpeg. `FFMPEG_PATH` environment variable wins, then the package
 * directory and its `bin/`, then `PATH`.
 */
export async function findFFmpeg(options: LookupOptions = {}): Promise<string | undefined> {
	const fromEnv = (options.env ?? process.env).FFMPEG_PATH?.trim();
	if (fromEnv) return fromEnv;
	return (await firstFile(packageCandidates('ffmpeg', options))) ?? (await findInPath('ffmpeg', options));
}

/**
 * Finds ffprobe, preferring the one next to ffmpeg.
 */
export async function findFFprobe(ffmpegPath?: string, options: LookupOptions = {}): Promise<string | undefined> {
	const candidates = packageCandidates('ffprobe', options);
	if (ffmpegPath) {
		candidates.unshift(Path.join(Path.dirname(Path.resolve(ffmpegPath)), executableName('ffprobe', options.isWin)));
	}
	return (await firstFile(candidates)) ?? (await findInPath('ffprobe', options));
}
