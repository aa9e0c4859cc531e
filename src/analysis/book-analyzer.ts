import fs from 'fs-extra';
import path from 'path';
import type { ChapterExtractor } from '../extraction/chapter-extractor.js';
import { MarkdownReportRenderer } from '../report/markdown-renderer.js';
import type { BookStatistics, ReportRenderer } from '../report/renderer.js';
import { CostCalculator } from './cost-calculator.js';
import { WriteError } from './errors.js';
import {
  tokenCounts,
  wordCounts,
  wordFrequencies,
  type TokenCountTable,
  type WordCounts,
  type WordFrequencyTable,
} from './frequency.js';
import type { PricingModel, TokenizerAdapter } from './tokenizer.js';

export interface BookAnalyzerDependencies {
  extractor: ChapterExtractor;
  tokenizer: TokenizerAdapter;
  models: readonly PricingModel[];
}

const REPORT_SUFFIX = '_word_stats';

/**
 * Computes word, token and cost statistics for one book and writes the report.
 *
 * Chapters are tokenized once, when the analyzer is built. Every accessor after that
 * reads the tokenized state; nothing is written until {@link writeStatistics}.
 */
export class BookAnalyzer {
  private readonly tokenizedChapters: string[][];

  constructor(
    public readonly sourcePath: string,
    private readonly chapters: readonly string[],
    private readonly tokenizer: TokenizerAdapter,
    private readonly models: readonly PricingModel[]
  ) {
    this.tokenizedChapters = chapters.map((chapter) => tokenizer.tokenizeWords(chapter));
  }

  /**
   * Extracts the chapters of a source and builds an analyzer over them
   * @param sourcePath - Path of the book to analyze
   * @param dependencies - Extractor, tokenizer and pricing models
   * @returns The analyzer
   */
  public static async fromSource(
    sourcePath: string,
    { extractor, tokenizer, models }: BookAnalyzerDependencies
  ): Promise<BookAnalyzer> {
    const chapters = await extractor.extractChapters(sourcePath);
    return new BookAnalyzer(sourcePath, chapters, tokenizer, models);
  }

  public get chapterCount(): number {
    return this.chapters.length;
  }

  public wordCounts(): WordCounts {
    return wordCounts(this.tokenizedChapters);
  }

  public wordFrequencies(): WordFrequencyTable {
    return wordFrequencies(this.tokenizedChapters);
  }

  public tokenCounts(): TokenCountTable {
    return tokenCounts(this.chapters, this.models, (text, model) =>
      this.tokenizer.encodeTokens(text, model)
    );
  }

  /**
   * Prices the full book text, chapters joined by single spaces, under a model
   * @param model - The pricing model
   * @returns The estimated cost
   */
  public calculateCost(model: PricingModel): number {
    const calculator = new CostCalculator(model, (text, m) => this.tokenizer.encodeTokens(text, m));
    return calculator.calculateCost(this.chapters.join(' '));
  }

  public collectStatistics(): BookStatistics {
    const { total, perChapter } = this.wordCounts();
    return {
      totalWordCount: total,
      chapterWordCounts: perChapter,
      tokenCounts: this.tokenCounts(),
      costs: this.models.map((model) => ({ model: model.name, cost: this.calculateCost(model) })),
      wordFrequencies: this.wordFrequencies(),
    };
  }

  /**
   * Derives the report path from the source path
   * @param extension - Extension of the report file, including the dot
   * @returns The source path with its extension replaced by the report suffix
   */
  public defaultReportPath(extension: string = '.md'): string {
    const { dir, name } = path.parse(this.sourcePath);
    return path.join(dir, `${name}${REPORT_SUFFIX}${extension}`);
  }

  /**
   * Renders the full report in memory and writes it in a single operation
   * @param destination - Report path; derived from the source when omitted
   * @param renderer - Report layout
   * @returns The path written
   */
  public async writeStatistics(
    destination?: string,
    renderer: ReportRenderer = new MarkdownReportRenderer()
  ): Promise<string> {
    const reportPath = destination ?? this.defaultReportPath(renderer.extension);
    const report = renderer.render(this.collectStatistics());

    // Written beside the destination, then moved over it, so a failed write leaves no report
    const tempPath = `${reportPath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, report, 'utf8');
      await fs.move(tempPath, reportPath, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath);
      throw new WriteError(reportPath, error);
    }
    return reportPath;
  }
}
