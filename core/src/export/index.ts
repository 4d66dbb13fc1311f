export { EXPORT_PROFILE, buildExportSpec, exportTimeline } from './exporter.js';
export type { ExportOptions } from './exporter.js';
export { acquireOutputLock, lockPathFor } from './output-lock.js';
export type { OutputLock } from './output-lock.js';
