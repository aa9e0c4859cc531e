import type { TokenCountTable, WordFrequencyTable } from '../analysis/frequency.js';

export type ReportFormat = 'text' | 'markdown';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown'];

export interface ModelCost {
  model: string;
  cost: number;
}

/**
 * Everything computed for a book in one analysis run
 */
export interface BookStatistics {
  totalWordCount: number;
  chapterWordCounts: number[];
  tokenCounts: TokenCountTable;
  costs: ModelCost[];
  wordFrequencies: WordFrequencyTable;
}

/**
 * Turns computed statistics into the text of a report file
 */
export interface ReportRenderer {
  readonly format: ReportFormat;
  readonly extension: string;
  render(statistics: BookStatistics): string;
}
