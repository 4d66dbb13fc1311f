export { createFfmpegMediaTool, type FfmpegMediaToolOptions } from './ffmpeg/media-tool.js';
export { FFMPEG_DEFAULTS, type FfmpegCommand, type FfmpegToolConfig, type FfmpegProgressSnapshot } from './ffmpeg/types.js';
export { buildSceneCommand } from './ffmpeg/scene-command.js';
export { buildExportCommand, buildTransitionGraph } from './ffmpeg/export-command.js';
export { XFADE_TRANSITIONS, escapeDrawtext, escapeDrawtextPath } from './ffmpeg/filters.js';
export { runFfmpeg, FfmpegProcessError, type RunFfmpegOptions } from './ffmpeg/run-ffmpeg.js';
export { createFileVoiceSource } from './sources/file-voice-source.js';
export { createFileFootageSource, type FileFootageSourceOptions } from './sources/file-footage-source.js';
