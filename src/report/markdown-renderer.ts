import type { BookStatistics, ReportRenderer } from './renderer.js';

export const DEFAULT_FREQUENCY_LIMIT = 200;

const groupedNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Formats an integer with comma thousands separators
 * @param value - The count to format
 * @returns The grouped count, e.g. "12,345"
 */
export function formatCount(value: number): string {
  return groupedNumber.format(value);
}

export function formatCurrency(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Reads the overview word total back out of a rendered Markdown report
 * @param report - The report text
 * @returns The total, or undefined when the report has no overview line
 */
export function parseOverviewTotal(report: string): number | undefined {
  const match = /^Total Word Count: ([\d,]+)$/m.exec(report);
  if (!match) {
    return undefined;
  }
  return Number.parseInt(match[1].replace(/,/g, ''), 10);
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

/**
 * Markdown report with an overview, a cost table, per-chapter counts and the
 * most frequent words
 */
export class MarkdownReportRenderer implements ReportRenderer {
  public readonly format = 'markdown' as const;
  public readonly extension = '.md';

  constructor(private frequencyLimit: number = DEFAULT_FREQUENCY_LIMIT) {}

  public render(statistics: BookStatistics): string {
    const models = [...statistics.tokenCounts.keys()];
    const lines: string[] = [
      '# Book Statistics',
      '',
      '## Overview',
      '',
      `Total Word Count: ${formatCount(statistics.totalWordCount)}`,
      '',
      '| Model | Cost |',
      '|-------|------|',
    ];

    for (const { model, cost } of statistics.costs) {
      lines.push(tableRow([escapeCell(model), formatCurrency(cost)]));
    }
    lines.push('');

    lines.push('## Word and Token Counts per Chapter', '');
    lines.push(tableRow(['Chapter', 'Words', ...models.map((model) => `${escapeCell(model)} Tokens`)]));
    lines.push('|---------|-------|' + models.map(() => '--------|').join(''));
    statistics.chapterWordCounts.forEach((wordCount, index) => {
      const tokenCells = models.map((model) =>
        formatCount(statistics.tokenCounts.get(model)?.perChapter[index] ?? 0)
      );
      lines.push(tableRow([String(index + 1), formatCount(wordCount), ...tokenCells]));
    });
    lines.push('');

    lines.push(`## Word Frequencies (First ${this.frequencyLimit} Words)`, '');
    lines.push('| Word | Frequency |', '|------|-----------|');
    let written = 0;
    for (const [word, frequency] of statistics.wordFrequencies) {
      if (written >= this.frequencyLimit) {
        break;
      }
      lines.push(tableRow([escapeCell(word), String(frequency)]));
      written++;
    }

    return lines.map((line) => `${line}\n`).join('');
  }
}
