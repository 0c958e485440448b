/**
 * CLI module
 */

export { DocFusionCLI, VERSION } from './cli.js';
export type { ExtractOptions } from './cli.js';
export { OutputFormatter, OUTPUT_FORMATS } from './formatter.js';
export type { OutputFormat } from './formatter.js';
