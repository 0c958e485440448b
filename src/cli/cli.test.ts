/**
 * CLI Tests
 *
 * Tests for: OutputFormatter, DocFusionCLI extract + config commands
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: () => ({ succeed: vi.fn(), fail: vi.fn(), stop: vi.fn() }),
  })),
}));

import { DocFusionCLI } from './cli.js';
import { OutputFormatter } from './formatter.js';
import { ConfigManager } from '../config/config.js';
import type { DocFusionConfig } from '../config/config.js';
import { DocumentExtractor, computeStatistics } from '../pipeline/document-extractor.js';
import type { DocumentResult, UnitResult } from '../content/types.js';
import { ConfigurationError, NotFoundError, RecognitionTimeoutError } from '../errors/docfusion-error.js';
import type { RecognitionResult } from '../recognition/adapter.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

function makeUnitResult(overrides: Partial<UnitResult> = {}): UnitResult {
  return {
    unitId: '1:notes.txt',
    position: 0,
    finalText: 'Meeting notes',
    contentType: 'NATIVE_TEXT_ONLY',
    extractionMethod: 'native_text',
    imageCount: 0,
    fusions: [],
    durationMs: 1,
    ...overrides,
  };
}

function makeDocument(): DocumentResult {
  const units = [
    makeUnitResult(),
    makeUnitResult({
      unitId: '2:scan.png',
      position: 1,
      finalText: 'Total Due: 230.00',
      contentType: 'IMAGE_ONLY',
      extractionMethod: 'image_pipeline',
      imageCount: 1,
      fusions: [{ finalText: 'Total Due: 230.00', method: 'VISION_ONLY', visionConfidence: 1 }],
    }),
  ];
  return {
    units,
    fullText: 'Meeting notes\n\nTotal Due: 230.00',
    statistics: computeStatistics(units, 40),
    isScanned: false,
  };
}

// Strip ANSI colour codes
function plain(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── OutputFormatter ─────────────────────────────────────────────────────────

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();

  it('plain output is the full text', () => {
    expect(formatter.format(makeDocument(), 'plain')).toBe('Meeting notes\n\nTotal Due: 230.00');
  });

  it('json output round-trips the result', () => {
    const doc = makeDocument();
    expect(JSON.parse(formatter.format(doc, 'json'))).toEqual(doc);
  });

  it('markdown output has one section per unit and the statistics', () => {
    const out = formatter.format(makeDocument(), 'markdown');
    expect(out).toBe(
      [
        '# Extracted text (2 units)',
        '',
        '## 1:notes.txt',
        '',
        '_NATIVE_TEXT_ONLY · native_text_',
        '',
        'Meeting notes',
        '',
        '## 2:scan.png',
        '',
        '_IMAGE_ONLY · image_pipeline_',
        '',
        'Total Due: 230.00',
        '',
        '---',
        '',
        '- Scanned: no',
        '- Content types: NATIVE_TEXT_ONLY: 1, IMAGE_ONLY: 1',
        '- Extraction methods: native_text: 1, image_pipeline: 1',
        '- Fusion methods: VISION_ONLY: 1',
        '- Images processed: 1',
        '- Characters extracted: 30',
        '',
      ].join('\n')
    );
  });

  it('summary mentions failed units', () => {
    const units = [makeUnitResult({ contentType: 'ERROR', extractionMethod: 'error', finalText: '[Processing failed: x]' })];
    const out = plain(formatter.formatSummary(computeStatistics(units, 5), true));
    expect(out).toContain('1 unit(s) failed; see the [Processing failed] entries.');
  });

  it('formatValidation lists errors', () => {
    expect(plain(formatter.formatValidation({ valid: false, errors: ['a is wrong', 'b is wrong'] }))).toBe(
      '❌ Configuration has errors:\n  - a is wrong\n  - b is wrong'
    );
    expect(plain(formatter.formatValidation({ valid: true, errors: [] }))).toBe('✅ Configuration is valid');
  });

  it('formatError adds a hint per error kind', () => {
    expect(plain(formatter.formatError(new NotFoundError('File not found: x.png')))).toBe(
      '\nError: File not found: x.png\nHint: Check the path and try again.'
    );
    expect(plain(formatter.formatError(new ConfigurationError('bad')))).toBe(
      '\nError: bad (CONFIG_ERROR)\nHint: Run `docfusion config validate` to check your configuration.'
    );
    expect(plain(formatter.formatError(new RecognitionTimeoutError('t', 30_000)))).toBe(
      '\nError: Recognition timed out after 30s.\nHint: This looks transient. Wait a moment and retry.'
    );
    expect(plain(formatter.formatError(new Error('boom')))).toBe('\nError: boom');
  });
});

// ─── DocFusionCLI ────────────────────────────────────────────────────────────

class TestCLI extends DocFusionCLI {
  lastConfig?: DocFusionConfig;

  protected override createExtractor(config: DocFusionConfig): DocumentExtractor {
    this.lastConfig = config;
    const vision = {
      engineId: 'vision:fake',
      kind: 'vision' as const,
      isAvailable: () => true,
      recognize: async (): Promise<RecognitionResult> => ({
        engineId: 'vision:fake',
        text: 'Scanned words here',
        confidence: 1,
        success: true,
      }),
    };
    return new DocumentExtractor({ adapters: { vision } });
  }
}

describe('DocFusionCLI', () => {
  let dir: string;
  let configPath: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docfusion-cli-'));
    configPath = path.join(dir, 'config.json');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  function writeFile(name: string, content: string | Buffer): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('extract prints plain text to stdout', async () => {
    const notes = writeFile('notes.txt', 'Meeting notes, final');
    const scan = writeFile('scan.png', Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    const cli = new TestCLI(new ConfigManager(configPath));
    await cli.run(['node', 'docfusion', 'extract', notes, scan]);
    expect(logSpy).toHaveBeenCalledWith('Meeting notes, final\n\nScanned words here');
    expect(process.exitCode).toBeUndefined();
  });

  it('extract writes JSON to --output', async () => {
    const notes = writeFile('notes.txt', 'Meeting notes, final');
    const out = path.join(dir, 'out.json');
    const cli = new TestCLI(new ConfigManager(configPath));
    await cli.run(['node', 'docfusion', 'extract', notes, '--format', 'json', '--output', out]);
    const parsed: unknown = JSON.parse(fs.readFileSync(out, 'utf-8'));
    expect(parsed).toMatchObject({ fullText: 'Meeting notes, final', isScanned: false });
  });

  it('extract applies --ocr-engine and --provider to the config', async () => {
    const notes = writeFile('notes.txt', 'Meeting notes, final');
    const cli = new TestCLI(new ConfigManager(configPath));
    await cli.run(['node', 'docfusion', 'extract', notes, '--ocr-engine', 'baidu', '--provider', 'anthropic']);
    expect(cli.lastConfig?.ocr.engine).toBe('baidu');
    expect(cli.lastConfig?.vision.provider).toBe('anthropic');
  });

  it('extract reports a missing file and sets the exit code', async () => {
    const cli = new TestCLI(new ConfigManager(configPath));
    await cli.run(['node', 'docfusion', 'extract', path.join(dir, 'missing.png')]);
    expect(process.exitCode).toBe(1);
    const messages = errorSpy.mock.calls.map((call) => plain(String(call[0])));
    expect(messages).toContain(`\nError: File not found: ${path.join(dir, 'missing.png')}\nHint: Check the path and try again.`);
  });

  it('config set persists a coerced value and config show prints it', async () => {
    const cli = new TestCLI(new ConfigManager(configPath));
    await cli.run(['node', 'docfusion', 'config', 'set', 'pipeline.unitConcurrency', '8']);
    expect(new ConfigManager(configPath).load().pipeline.unitConcurrency).toBe(8);

    logSpy.mockClear();
    await new TestCLI(new ConfigManager(configPath)).run(['node', 'docfusion', 'config', 'show']);
    const shown: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(shown).toMatchObject({ pipeline: { unitConcurrency: 8 } });
  });

  it('config show masks keys', async () => {
    const mgr = new ConfigManager(configPath);
    const config = ConfigManager.defaults();
    config.vision.openaiApiKey = 'test-secret';
    mgr.save(config);
    await new TestCLI(mgr).run(['node', 'docfusion', 'config', 'show']);
    const shown: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(shown).toMatchObject({ vision: { openaiApiKey: 'tes…' } });
  });

  it('config validate fails on a bad file', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ pipeline: { unitConcurrency: 0 } }));
    await new TestCLI(new ConfigManager(configPath)).run(['node', 'docfusion', 'config', 'validate']);
    expect(process.exitCode).toBe(1);
    expect(plain(String(errorSpy.mock.calls[0]?.[0]))).toBe(
      '❌ Configuration has errors:\n  - pipeline.unitConcurrency must be a positive integer'
    );
  });

  it('config set rejects unknown keys', async () => {
    await new TestCLI(new ConfigManager(configPath)).run(['node', 'docfusion', 'config', 'set', 'bogus.key', '1']);
    expect(process.exitCode).toBe(1);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('config reset removes the file', async () => {
    new ConfigManager(configPath).save(ConfigManager.defaults());
    await new TestCLI(new ConfigManager(configPath)).run(['node', 'docfusion', 'config', 'reset']);
    expect(fs.existsSync(configPath)).toBe(false);
    expect(logSpy).toHaveBeenCalledWith('✅ Configuration reset to defaults');
  });
});
