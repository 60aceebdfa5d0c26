export * from './config';
export * from './options';
export type {Log, LogLevel, Region} from './types';
export {Converter, convertBatch, mergeFileName, sizeChange} from './converter';
export type {BatchOptions, BatchResult, ConverterUtils} from './converter';
export {Session, describeSelection, formatProgress} from './session';
export type {Binaries, Listener, LogEntry, SelectionInfo, SessionOptions} from './session';
export {main} from './cli';
export type {CliIO} from './cli';

export {findFFmpeg, findFFprobe} from './lib/binaries';
export {
	detectEncoders,
	encoderQualityArgs,
	parseEncoderList,
	resolveCodec,
	selectEncoder,
	summarizeEncoders,
} from './lib/encoders';
export type {EncoderCaps, SelectedEncoder} from './lib/encoders';
export {AbortError, BinaryNotFoundError, ProcessExitError, runFFmpeg, withProgressArgs} from './lib/ffmpeg';
export type {ChildProcessLike, SpawnProcess} from './lib/ffmpeg';
export {makePhotoFilterSpec, makeVideoFilterSpec} from './lib/filters';
export type {FilterSpec} from './lib/filters';
export {interpolate, isLanguage, makeTranslator} from './lib/i18n';
export type {MessageKey, Translate} from './lib/i18n';
export {buildPhotoArgs} from './lib/image';
export {expandHome, expandPaths, makeQueueItem} from './lib/media';
export type {MediaKind, QueueItem} from './lib/media';
export {DEFAULT_PREFERENCES, coercePreferences, loadPreferences, savePreferences} from './lib/preferences';
export type {Preferences} from './lib/preferences';
export {DEFAULT_PRESETS, PresetExistsError, PresetStore, parsePresets} from './lib/presets';
export {describeMedia, makeProbe} from './lib/probe';
export type {MediaInfo, Probe} from './lib/probe';
export {ProgressParser, estimateEta, formatPercent, parseProgressTime} from './lib/progress';
export type {BatchState, FileProgress, ProgressUpdate, TotalProgress} from './lib/progress';
export {THEMES, resolveTheme} from './lib/themes';
export type {Palette} from './lib/themes';
export {buildMergeArgs, buildVideoArgs, fastCopyAllowed, mergeCopyAllowed} from './lib/video';
