import chalk from 'chalk';
import ora from 'ora';
import { BookAnalyzer } from '../analysis/book-analyzer.js';
import { TokenizerAdapter } from '../analysis/tokenizer.js';
import type { AppConfig } from '../config/config.js';
import { PlainTextChapterExtractor, type ChapterExtractor } from '../extraction/chapter-extractor.js';
import { createRenderer, type ReportFormat } from '../report/index.js';

/**
 * Interface for command options
 */
export interface AnalyzeOptions {
  output?: string;
  format?: ReportFormat;
  debug?: boolean;
}

/**
 * Collaborators the command can be given in place of the defaults
 */
export interface AnalyzeDependencies {
  extractor?: ChapterExtractor;
  tokenizer?: TokenizerAdapter;
}

/**
 * Analyzes a book and writes its statistics report
 * @param sourcePath - The book to analyze
 * @param options - Command options
 * @param config - The configuration
 * @param dependencies - Optional collaborator overrides
 * @returns The path of the written report
 */
export async function analyzeBook(
  sourcePath: string,
  options: AnalyzeOptions,
  config: AppConfig,
  dependencies: AnalyzeDependencies = {}
): Promise<string> {
  const models = config.pricing.models;
  const format = options.format ?? config.report.format;
  const renderer = createRenderer(format, { frequencyLimit: config.report.frequencyLimit });

  const spinner = ora('Loading token encoders...').start();
  try {
    const tokenizer = dependencies.tokenizer ?? TokenizerAdapter.create(models);
    tokenizer.prepare(models);

    spinner.text = `Reading chapters from ${sourcePath}...`;
    const extractor = dependencies.extractor ?? new PlainTextChapterExtractor(config.extraction.chapterHeading);
    const analyzer = await BookAnalyzer.fromSource(sourcePath, { extractor, tokenizer, models });
    spinner.succeed(`Read ${analyzer.chapterCount} chapter(s)`);

    if (options.debug) {
      const { total } = analyzer.wordCounts();
      console.log(chalk.gray(`Total words: ${total}`));
      for (const model of models) {
        console.log(chalk.gray(`Cost for ${model.name}: ${analyzer.calculateCost(model).toFixed(6)}`));
      }
    }

    spinner.start('Writing statistics...');
    const reportPath = await analyzer.writeStatistics(options.output, renderer);
    spinner.succeed(`Word statistics extracted and saved to ${chalk.cyan(reportPath)}`);
    return reportPath;
  } catch (error) {
    spinner.fail('Analysis failed');
    throw error;
  }
}
