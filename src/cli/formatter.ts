/**
 * DocFusion Output Formatter
 *
 * Renders a DocumentResult as plain text, Markdown or JSON, and formats
 * summaries, validation reports and errors for the terminal.
 */

import type { DocumentResult, DocumentStatistics, UnitResult } from '../content/types.js';
import { ErrorHandler } from '../errors/error-handler.js';
import { AuthenticationError, ConfigurationError, NotFoundError, UnsupportedInputError } from '../errors/docfusion-error.js';

export type OutputFormat = 'plain' | 'markdown' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['plain', 'markdown', 'json'];

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number): string {
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

/** "k1: n, k2: m" for the non-zero counts only */
function nonZero(counts: Record<string, number>): string {
  const parts = Object.entries(counts)
    .filter(([, n]) => n > 0)
    .map(([k, n]) => `${k}: ${n}`);
  return parts.length ? parts.join(', ') : '-';
}

export class OutputFormatter {
  format(result: DocumentResult, format: OutputFormat): string {
    switch (format) {
      case 'plain':
        return result.fullText;
      case 'markdown':
        return this.formatMarkdown(result);
      case 'json':
        return JSON.stringify(result, null, 2);
    }
  }

  /**
   * One section per unit, headed by its source, followed by the statistics.
   */
  formatMarkdown(result: DocumentResult): string {
    const lines: string[] = [`# Extracted text (${result.units.length} unit${result.units.length === 1 ? '' : 's'})`];

    for (const unit of result.units) {
      lines.push('', `## ${this.unitLabel(unit)}`, '', `_${unit.contentType} · ${unit.extractionMethod}_`);
      if (unit.finalText !== '') {
        lines.push('', unit.finalText);
      }
    }

    const s = result.statistics;
    lines.push(
      '',
      '---',
      '',
      `- Scanned: ${result.isScanned ? 'yes' : 'no'}`,
      `- Content types: ${nonZero(s.byContentType)}`,
      `- Extraction methods: ${nonZero(s.byExtractionMethod)}`,
      `- Fusion methods: ${nonZero(s.byFusionMethod)}`,
      `- Images processed: ${s.imagesProcessed}`,
      `- Characters extracted: ${s.charactersExtracted}`
    );
    return lines.join('\n') + '\n';
  }

  /** Short statistics block for the terminal. */
  formatSummary(stats: DocumentStatistics, isScanned: boolean): string {
    const lines = [header('Extraction Summary')];
    lines.push(field('Units', stats.totalUnits));
    lines.push(field('Content types', nonZero(stats.byContentType)));
    lines.push(field('Fusion methods', nonZero(stats.byFusionMethod)));
    lines.push(field('Images processed', stats.imagesProcessed));
    lines.push(field('Characters', stats.charactersExtracted));
    lines.push(field('Scanned', isScanned ? 'yes' : 'no'));
    lines.push(field('Duration', `${stats.durationMs}ms`));
    if (stats.byContentType.ERROR > 0) {
      lines.push(`${YELLOW}${stats.byContentType.ERROR} unit(s) failed; see the [Processing failed] entries.${RESET}`);
    }
    return lines.join('\n');
  }

  formatValidation(result: { valid: boolean; errors: string[] }): string {
    if (result.valid) {
      return `${GREEN}✅ Configuration is valid${RESET}`;
    }
    return [`${RED}❌ Configuration has errors:${RESET}`, ...result.errors.map((e) => `  - ${e}`)].join('\n');
  }

  /**
   * Format an error into a friendly, actionable message.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    if (error instanceof NotFoundError) {
      lines.push(`${YELLOW}Hint:${RESET} Check the path and try again.`);
    } else if (error instanceof UnsupportedInputError) {
      lines.push(`${YELLOW}Hint:${RESET} Pass image files (png, jpg, gif, webp, tiff) or text files (txt, md).`);
    } else if (error instanceof AuthenticationError) {
      lines.push(`${YELLOW}Hint:${RESET} Set DOCFUSION_BAIDU_API_KEY / DOCFUSION_BAIDU_SECRET_KEY or the vision provider key.`);
    } else if (error instanceof ConfigurationError) {
      lines.push(`${YELLOW}Hint:${RESET} Run \`docfusion config validate\` to check your configuration.`);
    } else if (ErrorHandler.isRetryable(error)) {
      lines.push(`${YELLOW}Hint:${RESET} This looks transient. Wait a moment and retry.`);
    }

    return lines.join('\n');
  }

  private unitLabel(unit: UnitResult): string {
    return unit.unitId !== '' ? unit.unitId : `Unit ${unit.position + 1}`;
  }
}
