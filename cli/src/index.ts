export { runCompose } from './commands/compose.js';
export type { ComposeCommandOptions, ComposeCommandResult } from './commands/compose.js';
export { loadProject, resolveProjectPaths } from './lib/project-loader.js';
export type { LoadedProject, ProjectFile } from './lib/project-loader.js';
export { createCliLogger, formatLogMeta, resolveLogLevel } from './lib/logger.js';
export type { CliLoggerOptions } from './lib/logger.js';
export { formatComposeSummary, formatCompositionPlan } from './lib/plan-display.js';
