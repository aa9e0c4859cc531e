import type { TiktokenEncoding } from 'js-tiktoken';
import type { PricingModel } from './tokenizer.js';

export interface WordCounts {
  total: number;
  perChapter: number[];
}

export interface TokenCounts {
  total: number;
  perChapter: number[];
}

/**
 * Distinct word to occurrence count, iterated in descending count order
 */
export type WordFrequencyTable = Map<string, number>;

/**
 * Model name to token counts, iterated in configured model order
 */
export type TokenCountTable = Map<string, TokenCounts>;

export type ChapterEncoder = (text: string, model: PricingModel) => number[];

/**
 * Counts word tokens per chapter and across the whole book
 * @param tokenizedChapters - Word tokens of each chapter, in chapter order
 * @returns The book total and the per-chapter counts
 */
export function wordCounts(tokenizedChapters: readonly (readonly string[])[]): WordCounts {
  const perChapter = tokenizedChapters.map((tokens) => tokens.length);
  const total = perChapter.reduce((sum, count) => sum + count, 0);
  return { total, perChapter };
}

/**
 * Counts every distinct word token across the book.
 *
 * Tokens are compared exactly as the tokenizer produced them. Equal counts keep the
 * order in which the words first appeared.
 * @param tokenizedChapters - Word tokens of each chapter, in chapter order
 * @returns The frequency table, most frequent first
 */
export function wordFrequencies(
  tokenizedChapters: readonly (readonly string[])[]
): WordFrequencyTable {
  const counts = new Map<string, number>();
  for (const tokens of tokenizedChapters) {
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  // Map iteration follows first insertion and Array.prototype.sort is stable
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return new Map(sorted);
}

/**
 * Encodes the raw text of each chapter once per encoding and counts the tokens
 * @param chapters - Chapter texts, in chapter order
 * @param models - The pricing models to count for
 * @param encode - Encoder for a text under a given model
 * @returns Token counts keyed by model name
 */
export function tokenCounts(
  chapters: readonly string[],
  models: readonly PricingModel[],
  encode: ChapterEncoder
): TokenCountTable {
  const byEncoding = new Map<TiktokenEncoding, number[]>();
  const table: TokenCountTable = new Map();

  for (const model of models) {
    let perChapter = byEncoding.get(model.encoding);
    if (!perChapter) {
      perChapter = chapters.map((chapter) => encode(chapter, model).length);
      byEncoding.set(model.encoding, perChapter);
    }
    table.set(model.name, {
      total: perChapter.reduce((sum, count) => sum + count, 0),
      perChapter: [...perChapter],
    });
  }

  return table;
}
