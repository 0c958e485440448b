/**
 * Tesseract language data
 *
 * Trained models ship as npm packages (`@tesseract.js-data/<code>`), one
 * package per language. A worker reads every language of a combined string
 * such as 'eng+chi_sim' from a single `langPath`, so the gzipped models are
 * copied side by side into one data directory before a worker starts.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { createRequire } from 'module';
import { ConfigurationError } from '../errors/docfusion-error.js';

/** Model variant matching tesseract.js' default LSTM engine */
export const TESSDATA_VARIANT = '4.0.0_best_int';

export const DEFAULT_TESSDATA_DIR = path.join(os.homedir(), '.docfusion', 'tessdata');

/** Returns the path of a package's package.json, or throws when it is not installed */
export type PackageResolver = (packageName: string) => string;

const require = createRequire(import.meta.url);

function resolveInstalledPackage(packageName: string): string {
  return require.resolve(`${packageName}/package.json`);
}

export function languageCodes(language: string): string[] {
  return language
    .split('+')
    .map((code) => code.trim())
    .filter((code) => code.length > 0);
}

/**
 * Make sure `<dataDir>/<code>.traineddata.gz` exists for every code in the
 * language string and return the directory. Files already present are kept.
 */
export function stageLanguageData(
  language: string,
  dataDir: string = DEFAULT_TESSDATA_DIR,
  resolvePackage: PackageResolver = resolveInstalledPackage
): string {
  fs.mkdirSync(dataDir, { recursive: true });

  for (const code of languageCodes(language)) {
    const target = path.join(dataDir, `${code}.traineddata.gz`);
    if (fs.existsSync(target)) continue;

    const packageName = `@tesseract.js-data/${code}`;
    let packageJson: string;
    try {
      packageJson = resolvePackage(packageName);
    } catch (err) {
      throw new ConfigurationError(
        `Tesseract language data for '${code}' is not installed (npm install ${packageName})`,
        { language: code, cause: err instanceof Error ? err.message : String(err) }
      );
    }

    const source = path.join(path.dirname(packageJson), TESSDATA_VARIANT, `${code}.traineddata.gz`);
    if (!fs.existsSync(source)) {
      throw new ConfigurationError(`Tesseract language data not found at ${source}`, { language: code });
    }
    fs.copyFileSync(source, target);
  }

  return dataDir;
}
