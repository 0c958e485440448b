/**
 * DocFusion - document text extraction with OCR and vision-model fusion
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Content model + classifier
export * from './content/index.js';

// Recognition adapters + dual-channel recognizer
export * from './recognition/index.js';

// Vision providers (OpenAI, Anthropic)
export * from './ai/index.js';

// Fusion decision engine
export * from './fusion/index.js';

// Text sanitizer
export * from './sanitize/index.js';

// Unit processor + document extractor
export * from './pipeline/index.js';

// File loader
export * from './input/index.js';

// Shared worker pool
export * from './performance/index.js';

// Typed errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// CLI
export { DocFusionCLI, OutputFormatter, VERSION } from './cli/index.js';
export type { ExtractOptions, OutputFormat } from './cli/index.js';
