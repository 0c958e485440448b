/**
 * DocFusion Errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  DocFusionError,
  AdapterError,
  RecognitionTimeoutError,
  UnitProcessingError,
  ConfigurationError,
  AuthenticationError,
  UnsupportedInputError,
  NotFoundError,
} from './docfusion-error.js';

export { ErrorHandler } from './error-handler.js';
export type { WrapResult } from './error-handler.js';
