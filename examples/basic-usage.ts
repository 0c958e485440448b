/**
 * Basic Usage Example
 *
 * Loads the configuration (file + DOCFUSION_* env vars), builds an extractor
 * and extracts text from the files given on the command line.
 *
 *   npx tsx examples/basic-usage.ts scan.png notes.txt
 */

import dotenv from 'dotenv';
import { ConfigManager, DocumentExtractor } from '../src/index.js';

dotenv.config();

async function main(): Promise<void> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error('Usage: basic-usage <files...>');
    process.exitCode = 1;
    return;
  }

  // 1. Load config
  const config = new ConfigManager().loadWithEnvOverrides();

  // 2. Build the extractor from config
  const extractor = DocumentExtractor.fromConfig(config);

  try {
    // 3. Extract
    const result = await extractor.processFiles(files, {
      useOcr: config.pipeline.useOcr,
      useVision: config.pipeline.useVision,
    });

    // 4. Inspect
    for (const unit of result.units) {
      const methods = unit.fusions.map((f) => f.method).join(', ') || '-';
      console.log(`${unit.unitId}: ${unit.contentType} via ${unit.extractionMethod} [${methods}]`);
    }
    console.log(`Scanned: ${result.isScanned}`);
    console.log(result.fullText);
  } finally {
    await extractor.close();
  }
}

main().catch(console.error);
