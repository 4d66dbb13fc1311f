export * from './types.js';
export * from './logger.js';
export * from './errors/index.js';
export * from './config.js';
export * from './random.js';
export * from './sources.js';
export * from './media/types.js';
export * from './audio/normalizer.js';
export * from './timeline/scene-timeline.js';
export * from './timeline/avatar-slot.js';
export * from './render/captions.js';
export * from './render/scene-renderer.js';
export * from './stitch/transition-stitcher.js';
export * from './export/index.js';
export * from './orchestration/scene-pool.js';
export * from './orchestration/compose-run.js';
export { compileSchemaFile, loadSchemaValidator, validateAgainstSchema } from './validation/schema-validator.js';
export type { SchemaValidationResult } from './validation/schema-validator.js';
