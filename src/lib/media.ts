import {promises as FSP} from 'fs';
import * as OS from 'os';
import * as Path from 'path';
import {PHOTO_EXTENSIONS, VIDEO_EXTENSIONS} from '../config';
import {uid} from './utils';

export type MediaKind = 'video' | 'photo';

export interface QueueItem {
	id: string;
	/** File name displayed in lists. */
	name: string;
	path: string;
	kind: MediaKind;
}

/**
 * Lowercase extension without the dot.
 */
export const extensionOf = (path: string) => Path.extname(path).slice(1).toLowerCase();

export function mediaKind(path: string): MediaKind | undefined {
	const extension = extensionOf(path);
	if (VIDEO_EXTENSIONS.has(extension)) return 'video';
	if (PHOTO_EXTENSIONS.has(extension)) return 'photo';
	return undefined;
}

/**
 * Creates a queue item, or `undefined` for unsupported files.
 */
export function makeQueueItem(path: string): QueueItem | undefined {
	const kind = mediaKind(path);
	if (!kind) return undefined;
	return {id: uid(), name: Path.basename(path), path: Path.resolve(path), kind};
}

/**
 * Lists all files inside a directory, recursively, in a stable order.
 */
export async function collectFiles(directory: string): Promise<string[]> {
	const files: string[] = [];
	const entries = await FSP.readdir(directory, {withFileTypes: true});
	entries.sort((a, b) => a.name.localeCompare(b.name));

	for (const entry of entries) {
		const path = Path.join(directory, entry.name);
		if (entry.isDirectory()) files.push(...(await collectFiles(path)));
		else if (entry.isFile()) files.push(path);
	}

	return files;
}

/**
 * Expands directories into the files they contain.
 */
export async function expandPaths(paths: string[]): Promise<string[]> {
	const result: string[] = [];
	for (const path of paths) {
		const stat = await FSP.stat(path).catch(() => null);
		if (stat?.isDirectory()) result.push(...(await collectFiles(path)));
		else result.push(path);
	}
	return result;
}

export async function exists(path: string) {
	try {
		await FSP.access(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Expands a leading `~` into the home directory.
 * ```
 * expandHome('~/Videos', '/home/me'); // '/home/me/Videos'
 * ```
 */
export function expandHome(path: string, home = OS.homedir()) {
	if (path === '~') return home;
	return /^~[\\/]/.test(path) ? Path.join(home, path.slice(2)) : path;
}
