import type { BookStatistics, ReportRenderer } from './renderer.js';

/**
 * Flat line-per-value report listing every distinct word
 */
export class PlainTextReportRenderer implements ReportRenderer {
  public readonly format = 'text' as const;
  public readonly extension = '.txt';

  public render(statistics: BookStatistics): string {
    const lines: string[] = [];

    lines.push(`Total Word Count: ${statistics.totalWordCount}`, '');

    statistics.chapterWordCounts.forEach((count, index) => {
      lines.push(`Chapter ${index + 1} Word Count: ${count}`);
    });

    lines.push('', 'Cost Calculations for each model:');
    for (const { model, cost } of statistics.costs) {
      lines.push(`Cost for ${model}: ${cost.toFixed(6)}`);
    }

    lines.push('', 'Word Frequencies (entire book):');
    for (const [word, frequency] of statistics.wordFrequencies) {
      lines.push(`${word}: ${frequency}`);
    }

    return lines.map((line) => `${line}\n`).join('');
  }
}
