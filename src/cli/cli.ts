/**
 * DocFusion CLI
 *
 * Commands:
 *   docfusion extract <files...> [--no-ocr] [--no-vision] [--ocr-engine tesseract|baidu]
 *                                [--provider openai|anthropic|auto] [--format plain|markdown|json]
 *                                [--output <path>]
 *   docfusion config show
 *   docfusion config validate
 *   docfusion config set <key> <value>
 *   docfusion config reset
 */

import fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigManager, OCR_ENGINES, VISION_PROVIDER_CHOICES, setConfigValue } from '../config/config.js';
import type { DocFusionConfig, OcrEngineName } from '../config/config.js';
import type { VisionProviderChoice } from '../ai/provider.js';
import { DocumentExtractor } from '../pipeline/document-extractor.js';
import type { ChannelFlags } from '../recognition/dual-channel-recognizer.js';
import type { DocumentResult } from '../content/types.js';
import { OutputFormatter, OUTPUT_FORMATS } from './formatter.js';
import type { OutputFormat } from './formatter.js';

export const VERSION = '0.1.0';

export interface ExtractOptions {
  ocr: boolean;
  vision: boolean;
  ocrEngine?: OcrEngineName;
  provider?: VisionProviderChoice;
  format: OutputFormat;
  output?: string;
}

interface Spinner {
  stop: (symbol?: string, text?: string) => void;
}

// Spinner factory, lazily imported so tests can run without a real TTY
async function spinner(text: string): Promise<Spinner> {
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (symbol?: string, text?: string) => {
        if (symbol === '✓') {
          s.succeed(text);
        } else if (symbol === '✗') {
          s.fail(text);
        } else {
          s.stop();
        }
      },
    };
  } catch {
    // Fallback for environments without ora
    process.stderr.write(`${text}...\n`);
    return { stop: () => undefined };
  }
}

function choiceParser<T extends string>(name: string, choices: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = choices.find((c) => c === value);
    if (!match) {
      throw new InvalidArgumentError(`${name} must be one of: ${choices.join(', ')}`);
    }
    return match;
  };
}

export class DocFusionCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  /** Exposed for tests that tweak exit handling or output. */
  getProgram(): Command {
    return this.program;
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('docfusion')
      .version(VERSION, '-V, --version', 'Print version')
      .description('Extract text from documents and images with OCR and vision-model fusion');

    // ── extract ────────────────────────────────────────────────────────────
    program
      .command('extract')
      .description('Extract text from image and text files, treated as one document')
      .argument('<files...>', 'Image (png, jpg, gif, webp, tiff) or text (txt, md) files')
      .option('--no-ocr', 'Disable the OCR channel')
      .option('--no-vision', 'Disable the vision-model channel')
      .option('--ocr-engine <engine>', 'OCR engine: tesseract|baidu', choiceParser('--ocr-engine', OCR_ENGINES))
      .option(
        '--provider <provider>',
        'Vision provider: openai|anthropic|auto',
        choiceParser('--provider', VISION_PROVIDER_CHOICES)
      )
      .option('-f, --format <format>', 'Output format: plain|markdown|json', choiceParser('--format', OUTPUT_FORMATS), 'plain')
      .option('-o, --output <path>', 'Write output to a file instead of stdout')
      .action(async (files: string[], opts: ExtractOptions) => {
        await this.extract(files, opts);
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Manage DocFusion configuration');

    config
      .command('show')
      .description('Print the effective configuration (file + environment)')
      .action(() => {
        this.guard(() => {
          console.log(JSON.stringify(this.redact(this.configManager.loadWithEnvOverrides()), null, 2));
        });
      });

    config
      .command('validate')
      .description('Validate the effective configuration')
      .action(() => {
        this.guard(() => {
          const result = this.configManager.validate(this.configManager.loadWithEnvOverrides());
          const report = this.formatter.formatValidation(result);
          if (result.valid) {
            console.log(report);
          } else {
            console.error(report);
            process.exitCode = 1;
          }
        });
      });

    config
      .command('set <key> <value>')
      .description('Set a configuration key, e.g. pipeline.unitConcurrency 8')
      .action((key: string, value: string) => {
        this.guard(() => {
          // File values only: env overrides must not be persisted
          const updated = setConfigValue(this.configManager.load(), key, value);
          this.configManager.save(updated);
          console.log(`✅ Set ${key} = ${value}`);
        });
      });

    config
      .command('reset')
      .description('Delete the configuration file and return to defaults')
      .action(() => {
        this.guard(() => {
          this.configManager.reset();
          console.log('✅ Configuration reset to defaults');
        });
      });

    return program;
  }

  // ─── Commands ─────────────────────────────────────────────────────────────

  private async extract(files: string[], opts: ExtractOptions): Promise<void> {
    const spin = await spinner(`Extracting ${files.length} file(s)`);
    let extractor: DocumentExtractor | undefined;
    try {
      const config = this.configManager.loadWithEnvOverrides();
      if (opts.ocrEngine) config.ocr.engine = opts.ocrEngine;
      if (opts.provider) config.vision.provider = opts.provider;

      const flags: ChannelFlags = {
        useOcr: opts.ocr && config.pipeline.useOcr,
        useVision: opts.vision && config.pipeline.useVision,
      };

      extractor = this.createExtractor(config);
      const result = await extractor.processFiles(files, flags);
      spin.stop('✓', `Extracted ${result.statistics.totalUnits} unit(s)`);

      this.writeResult(result, opts);
      console.error(this.formatter.formatSummary(result.statistics, result.isScanned));
    } catch (err) {
      spin.stop('✗', 'Extraction failed');
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    } finally {
      await extractor?.close();
    }
  }

  private writeResult(result: DocumentResult, opts: ExtractOptions): void {
    const output = this.formatter.format(result, opts.format);
    if (opts.output) {
      fs.writeFileSync(opts.output, output.endsWith('\n') ? output : `${output}\n`, 'utf-8');
    } else {
      console.log(output);
    }
  }

  private guard(action: () => void): void {
    try {
      action();
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }

  private redact(config: DocFusionConfig): DocFusionConfig {
    const mask = (value?: string): string | undefined => (value ? `${value.slice(0, 3)}…` : value);
    return {
      ...config,
      ocr: { ...config.ocr, baiduApiKey: mask(config.ocr.baiduApiKey), baiduSecretKey: mask(config.ocr.baiduSecretKey) },
      vision: {
        ...config.vision,
        openaiApiKey: mask(config.vision.openaiApiKey),
        anthropicApiKey: mask(config.vision.anthropicApiKey),
      },
    };
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createExtractor(config: DocFusionConfig): DocumentExtractor {
    return DocumentExtractor.fromConfig(config);
  }
}
