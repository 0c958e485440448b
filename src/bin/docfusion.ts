#!/usr/bin/env node
/**
 * DocFusion CLI entry point
 *
 * Compiled to dist/bin/docfusion.js by TypeScript.
 * Registered as the `docfusion` binary in package.json.
 */

import dotenv from 'dotenv';
import { DocFusionCLI } from '../cli/cli.js';

dotenv.config();

const cli = new DocFusionCLI();
cli.run(process.argv).catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
