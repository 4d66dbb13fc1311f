export {
  AssetErrorCode,
  ConfigErrorCode,
  DecodeErrorCode,
  ErrorCode,
  ExportErrorCode,
  TimingErrorCode,
  getErrorCategory,
} from './codes.js';
export type { ErrorCategory, ErrorCodeValue } from './codes.js';

export {
  ReelsmithError,
  createReelsmithError,
  formatError,
  hasErrorCode,
  isReelsmithError,
} from './reelsmith-error.js';
export type { CreateErrorOptions } from './reelsmith-error.js';
