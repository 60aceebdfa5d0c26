import {parseArgs} from 'util';
import {LANGUAGES, THEME_NAMES} from './config';
import {FormValues, applyPreset, makeDefaultFormValues, serializeFormValues} from './options';
import {LogEntry, Session, SessionOptions} from './session';
import type {LogLevel} from './types';
import {isLanguage} from './lib/i18n';
import type {Preferences} from './lib/preferences';
import {ANSI_RESET, Palette, ansiForeground, isHexColor} from './lib/themes';
import {eem} from './lib/utils';

export interface CliIO {
	stdout: {write(text: string): unknown; isTTY?: boolean};
	stderr: {write(text: string): unknown};
	env?: NodeJS.ProcessEnv;
	/** Registers a Ctrl+C handler, returns its disposer. */
	onInterrupt?: (handler: () => void) => () => void;
	/** Passed to the session, for tests. */
	session?: Partial<Omit<SessionOptions, 'presets' | 'preferences' | 'preferencesPath'>>;
}

export const USAGE = `Usage:
  mediaconv convert <paths...> [--out DIR] [--preset NAME] [--set key=value]... [--ffmpeg PATH] [--lang L]
  mediaconv presets list
  mediaconv presets show <name>
  mediaconv presets save <name> [--preset BASE] [--set key=value]... [--overwrite]
  mediaconv presets delete <name>
  mediaconv encoders [--ffmpeg PATH]
  mediaconv probe <file> [--ffmpeg PATH]
  mediaconv prefs [--theme ${THEME_NAMES.join('|')}] [--accent #RRGGBB] [--lang ${LANGUAGES.join(
	'|'
)}] [--ffmpeg PATH] [--out DIR]
`;

const LEVEL_COLORS: Record<LogLevel, keyof Palette | undefined> = {
	info: undefined,
	ok: 'success',
	warn: 'warn',
	error: 'error',
};

/**
 * `[HH:MM:SS] LEVEL: message`
 */
export function formatLogLine({time, level, message}: LogEntry) {
	const date = new Date(time);
	const clock = [date.getHours(), date.getMinutes(), date.getSeconds()]
		.map((value) => `${value}`.padStart(2, '0'))
		.join(':');
	return `[${clock}] ${level.toUpperCase()}: ${message}`;
}

/**
 * Text progress bar.
 * ```
 * renderBar(0.5, 10); // '█████░░░░░'
 * ```
 */
export function renderBar(fraction: number, width: number, color?: string) {
	const filled = Math.round(Math.min(Math.max(fraction, 0), 1) * width);
	const done = '█'.repeat(filled);
	return `${color ? `${color}${done}${ANSI_RESET}` : done}${'░'.repeat(width - filled)}`;
}

/**
 * Parses repeated `--set key=value` flags.
 */
export function parseAssignments(assignments: string[] = []) {
	const values: Record<string, string> = {};
	const invalid: string[] = [];
	for (const assignment of assignments) {
		const index = assignment.indexOf('=');
		if (index < 1) invalid.push(assignment);
		else values[assignment.slice(0, index).trim()] = assignment.slice(index + 1);
	}
	return {values, invalid};
}

/**
 * Prints session log entries as they come, and redraws the progress line.
 */
function attachPrinter(session: Session, io: CliIO, {progress = false}: {progress?: boolean} = {}) {
	let printed = session.logCount;
	let progressDrawn = false;
	const color = (level: LogLevel) => {
		const key = LEVEL_COLORS[level];
		return key && io.stdout.isTTY ? ansiForeground(session.theme[key]) : '';
	};

	const clearProgress = () => {
		if (progressDrawn) io.stdout.write('\r\x1b[2K');
		progressDrawn = false;
	};

	const print = () => {
		const fresh = Math.min(session.logCount - printed, session.log.length);
		if (fresh > 0) {
			clearProgress();
			for (const entry of session.log.slice(-fresh)) {
				const line = formatLogLine(entry);
				const prefix = color(entry.level);
				const text = prefix ? `${prefix}${line}${ANSI_RESET}` : line;
				(entry.level === 'error' ? io.stderr : io.stdout).write(`${text}\n`);
			}
		}
		printed = session.logCount;

		if (progress && io.stdout.isTTY && session.isRunning) {
			const accent = ansiForeground(session.theme.accent);
			io.stdout.write(
				`\r\x1b[2K${renderBar(session.totalProgress, 30, accent)} ${session.totalProgressText} | ${
					session.fileProgressText
				}`
			);
			progressDrawn = true;
		}
	};

	const unsubscribe = session.subscribe(print);
	return () => {
		unsubscribe();
		clearProgress();
	};
}

async function convert(session: Session, positionals: string[], values: ParsedValues, io: CliIO) {
	if (positionals.length === 0) {
		io.stderr.write(USAGE);
		return 1;
	}

	if (values.preset && !session.loadPreset(values.preset)) return 1;

	const {values: assignments, invalid} = parseAssignments(values.set);
	for (const assignment of invalid) session.addLog('warn', session.t('invalidAssignment', {value: assignment}));
	session.setFormValues(assignments);

	await session.addPaths(positionals);
	if (session.queue.length === 0) return 1;
	await session.refreshEncoders();

	const disposeInterrupt = io.onInterrupt?.(() => session.stop());
	try {
		const result = await session.start();
		return result && !result.stopped && result.failed === 0 ? 0 : 1;
	} finally {
		disposeInterrupt?.();
	}
}

async function presets(session: Session, [action, name]: string[], values: ParsedValues, io: CliIO) {
	switch (action) {
		case undefined:
		case 'list':
			for (const presetName of session.presets.names()) io.stdout.write(`${presetName}\n`);
			return 0;

		case 'show': {
			const preset = name ? session.presets.get(name) : undefined;
			if (!preset) {
				io.stderr.write(`${session.t('presetNotFound', {name: name ?? ''})}\n`);
				return 1;
			}
			io.stdout.write(`${JSON.stringify(serializeFormValues(preset), null, 2)}\n`);
			return 0;
		}

		case 'save': {
			if (!name) break;
			let form: FormValues = makeDefaultFormValues();
			if (values.preset) {
				const base = session.presets.get(values.preset);
				if (!base) {
					io.stderr.write(`${session.t('presetNotFound', {name: values.preset})}\n`);
					return 1;
				}
				form = applyPreset(form, base);
			}
			session.form = form;
			const {values: assignments, invalid} = parseAssignments(values.set);
			for (const assignment of invalid) session.addLog('warn', session.t('invalidAssignment', {value: assignment}));
			session.setFormValues(assignments);
			await session.savePreset(name, {overwrite: values.overwrite});
			return 0;
		}

		case 'delete':
			if (!name) break;
			return (await session.deletePreset(name)) ? 0 : 1;
	}

	io.stderr.write(USAGE);
	return 1;
}

async function encoders(session: Session, io: CliIO) {
	const caps = await session.refreshEncoders();
	if (!session.binaries.ffmpegPath) return 1;
	io.stdout.write(`${session.encoderInfo}\n`);
	for (const encoder of [...caps].sort()) io.stdout.write(`  ${encoder}\n`);
	return 0;
}

async function probe(session: Session, [path]: string[], io: CliIO) {
	if (!path) {
		io.stderr.write(USAGE);
		return 1;
	}
	await session.addPaths([path]);
	const selection = await session.select(0);
	if (!selection) return 1;
	const rows: [string, string][] = [
		[session.t('infoName'), selection.name],
		[session.t('infoDuration'), selection.duration],
		[session.t('infoCodecs'), selection.codecs],
		[session.t('infoResolution'), selection.resolution],
		[session.t('infoSize'), selection.size],
		[session.t('infoContainer'), selection.container],
	];
	for (const [label, value] of rows) io.stdout.write(`${label}: ${value}\n`);
	return 0;
}

async function prefs(session: Session, values: ParsedValues, io: CliIO) {
	const patch: Partial<Preferences> = {};

	if (values.theme != null) {
		const theme = THEME_NAMES.find((name) => name === values.theme);
		if (!theme) {
			io.stderr.write(`${session.t('invalidOption', {name: 'theme', value: values.theme})}\n`);
			return 1;
		}
		patch.theme = theme;
	}
	if (values.lang != null) {
		if (!isLanguage(values.lang)) {
			io.stderr.write(`${session.t('invalidOption', {name: 'lang', value: values.lang})}\n`);
			return 1;
		}
		patch.language = values.lang;
	}
	if (values.accent != null) {
		if (values.accent !== '' && !isHexColor(values.accent)) {
			io.stderr.write(`${session.t('invalidOption', {name: 'accent', value: values.accent})}\n`);
			return 1;
		}
		patch.accent = values.accent;
	}
	if (values.ffmpeg != null) patch.ffmpegPath = values.ffmpeg.trim();
	if (values.out != null) patch.outputDirectory = values.out.trim();

	if (Object.keys(patch).length > 0) await session.setPreferences(patch);

	const {theme, accent, language, ffmpegPath, outputDirectory} = session.preferences;
	const palette = session.theme;
	const swatch = io.stdout.isTTY ? `${ansiForeground(palette.accent)}■${ANSI_RESET} ` : '';
	io.stdout.write(`theme: ${theme}
accent: ${swatch}${accent || palette.accent}
lang: ${language}
ffmpeg: ${ffmpegPath || '(auto)'}
out: ${outputDirectory}
`);
	return 0;
}

const OPTIONS = {
	out: {type: 'string'},
	preset: {type: 'string'},
	set: {type: 'string', multiple: true},
	ffmpeg: {type: 'string'},
	lang: {type: 'string'},
	theme: {type: 'string'},
	accent: {type: 'string'},
	overwrite: {type: 'boolean'},
	help: {type: 'boolean', short: 'h'},
} as const;

const parseCommandLine = (args: string[]) => parseArgs({args, options: OPTIONS, allowPositionals: true, strict: true});

type ParsedValues = ReturnType<typeof parseCommandLine>['values'];

/**
 * Runs the command line, resolves with the exit code.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
	let parsed: ReturnType<typeof parseCommandLine>;

	try {
		parsed = parseCommandLine(argv);
	} catch (error) {
		io.stderr.write(`${eem(error)}\n\n${USAGE}`);
		return 1;
	}

	const {values, positionals} = parsed;
	const [command, ...rest] = positionals;

	if (values.help || !command) {
		io.stdout.write(USAGE);
		return values.help ? 0 : 1;
	}

	const session = await Session.create({
		env: io.env,
		onInvalid: (message) => io.stderr.write(`${message}\n`),
		...io.session,
	});

	// Flags on commands other than prefs apply to this run only
	if (command !== 'prefs') {
		const overrides: Partial<Preferences> = {};
		if (values.ffmpeg) overrides.ffmpegPath = values.ffmpeg.trim();
		if (values.out) overrides.outputDirectory = values.out.trim();
		if (values.lang && isLanguage(values.lang)) overrides.language = values.lang;
		await session.setPreferences(overrides, {persist: false});
	}

	const dispose = attachPrinter(session, io, {progress: command === 'convert'});

	try {
		switch (command) {
			case 'convert':
				return await convert(session, rest, values, io);
			case 'presets':
				return await presets(session, rest, values, io);
			case 'encoders':
				return await encoders(session, io);
			case 'probe':
				return await probe(session, rest, io);
			case 'prefs':
				return await prefs(session, values, io);
			default:
				io.stderr.write(`${session.t('unknownCommand', {command})}\n\n${USAGE}`);
				return 1;
		}
	} catch (error) {
		session.addLog('error', eem(error));
		return 1;
	} finally {
		dispose();
	}
}
