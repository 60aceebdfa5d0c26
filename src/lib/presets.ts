import {promises as FSP} from 'fs';
import * as Path from 'path';
import type {JsonPrimitive} from 'type-fest';
import {PresetValues, coerceFormValues, serializeFormValues} from '../options';
import {MessageError, eem, isErrnoException} from './utils';

export class PresetExistsError extends MessageError {
	constructor(public readonly presetName: string) {
		super(`Preset "${presetName}" already exists.`);
	}
}

export const DEFAULT_PRESETS: Readonly<Record<string, Readonly<PresetValues>>> = {
	'H.264 • Balance (MP4)': {
		videoFormat: 'mp4',
		crf: 23,
		preset: 'medium',
		codec: 'h264',
		hardware: 'auto',
		fastCopy: false,
	},
	'H.265 • Smaller size (MP4)': {
		videoFormat: 'mp4',
		crf: 26,
		preset: 'slow',
		codec: 'h265',
		hardware: 'auto',
		fastCopy: false,
	},
	'AV1 • Quality/size (MKV)': {
		videoFormat: 'mkv',
		crf: 30,
		preset: 'medium',
		codec: 'av1',
		hardware: 'auto',
		fastCopy: false,
	},
	'WebM • VP9 (Web)': {
		videoFormat: 'webm',
		crf: 28,
		preset: 'slow',
		codec: 'vp9',
		hardware: 'auto',
		fastCopy: false,
	},
	'GPU • NVENC H.264 (Fast)': {
		videoFormat: 'mp4',
		crf: 23,
		preset: 'fast',
		codec: 'h264',
		hardware: 'nvidia',
		fastCopy: false,
	},
	'Fast copy (no re-encoding)': {
		fastCopy: true,
		codec: 'auto',
		hardware: 'auto',
	},
	'GIF 480p': {
		videoFormat: 'gif',
		crf: 23,
		preset: 'medium',
		codec: 'auto',
		fastCopy: false,
		resizeWidth: '640',
		resizeHeight: '',
	},
	'Photo → JPG (90)': {
		photoFormat: 'jpg',
		photoQuality: 90,
	},
	'Photo → WebP (80)': {
		photoFormat: 'webp',
		photoQuality: 80,
	},
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	value != null && typeof value === 'object' && !Array.isArray(value);

/**
 * Parses presets file contents. Entries that aren't objects are skipped,
 * invalid fields inside entries are dropped.
 */
export function parsePresets(
	json: string,
	onInvalid?: (preset: string, field: string, value: unknown) => void
): Map<string, PresetValues> {
	const presets = new Map<string, PresetValues>();
	const data: unknown = JSON.parse(json);
	if (!isRecord(data)) return presets;

	for (const [name, raw] of Object.entries(data)) {
		if (!isRecord(raw)) {
			onInvalid?.(name, '', raw);
			continue;
		}
		presets.set(name, coerceFormValues(raw, (field, value) => onInvalid?.(name, field, value)));
	}

	return presets;
}

/**
 * Named option bundles persisted in a JSON file. Built-in presets are
 * always available, file entries override them by name.
 */
export class PresetStore {
	private constructor(public readonly path: string, private presets: Map<string, PresetValues>) {}

	/**
	 * Missing or malformed file yields just the built-ins.
	 */
	static async load(path: string, {onInvalid}: {onInvalid?: (message: string) => void} = {}) {
		const presets = new Map(
			Object.entries(DEFAULT_PRESETS).map(([name, values]): [string, PresetValues] => [name, {...values}])
		);
		let json: string | undefined;

		try {
			json = await FSP.readFile(path, 'utf8');
		} catch (error) {
			// Missing file is the normal first run state
			if (!isErrnoException(error) || error.code !== 'ENOENT') {
				onInvalid?.(`Presets file couldn't be read: ${eem(error)}`);
			}
		}

		if (json != null) {
			try {
				const stored = parsePresets(json, (preset, field, value) =>
					onInvalid?.(
						field
							? `Preset "${preset}": invalid value of "${field}": ${JSON.stringify(value)}`
							: `Preset "${preset}" is not an object.`
					)
				);
				for (const [name, values] of stored) presets.set(name, values);
			} catch (error) {
				onInvalid?.(`Presets file is malformed: ${eem(error)}`);
			}
		}

		return new PresetStore(path, presets);
	}

	/**
	 * Store over an in-memory map, for when nothing should be read.
	 */
	static fromEntries(path: string, entries: Iterable<[string, PresetValues]>) {
		return new PresetStore(path, new Map(entries));
	}

	names() {
		return [...this.presets.keys()].sort((a, b) => a.localeCompare(b));
	}

	has(name: string) {
		return this.presets.has(name);
	}

	get(name: string): PresetValues | undefined {
		const values = this.presets.get(name);
		return values ? {...values} : undefined;
	}

	/**
	 * Saves and persists a preset. Replacing an existing one needs `overwrite`.
	 */
	async save(name: string, values: PresetValues, {overwrite = false}: {overwrite?: boolean} = {}) {
		name = name.trim();
		if (!name) throw new MessageError(`Preset name can't be empty.`);
		if (this.presets.has(name) && !overwrite) throw new PresetExistsError(name);
		this.presets.set(name, {...values});
		await this.write();
	}

	/**
	 * Resolves `false` when there was nothing to delete.
	 */
	async delete(name: string) {
		if (!this.presets.delete(name)) return false;
		await this.write();
		return true;
	}

	toJSON() {
		const result: Record<string, Record<string, JsonPrimitive>> = {};
		for (const name of this.names()) {
			const values = this.presets.get(name);
			if (values) result[name] = serializeFormValues(values);
		}
		return result;
	}

	private async write() {
		await FSP.mkdir(Path.dirname(this.path), {recursive: true});
		await FSP.writeFile(this.path, `${JSON.stringify(this.toJSON(), null, 2)}\n`, 'utf8');
	}
}
