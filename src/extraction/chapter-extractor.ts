import fs from 'fs-extra';
import { ExtractionError, SourceNotFoundError } from '../analysis/errors.js';

/**
 * Produces the ordered chapter texts of a book
 */
export interface ChapterExtractor {
  extractChapters(sourcePath: string): Promise<string[]>;
}

export const DEFAULT_CHAPTER_HEADING = '^(?:#{1,2}\\s+\\S|chapter\\s+\\S)';

function isAccessError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'EACCES' || error.code === 'EPERM';
}

/**
 * Reads a plain-text or Markdown manuscript and splits it at chapter headings.
 *
 * A chapter starts on every line matching the heading pattern. Text before the first
 * heading becomes a chapter of its own when it is not blank.
 */
export class PlainTextChapterExtractor implements ChapterExtractor {
  private heading: RegExp;

  constructor(chapterHeading: string = DEFAULT_CHAPTER_HEADING) {
    this.heading = new RegExp(chapterHeading, 'i');
  }

  public async extractChapters(sourcePath: string): Promise<string[]> {
    if (!(await fs.pathExists(sourcePath))) {
      throw new SourceNotFoundError(sourcePath);
    }

    let content: string;
    try {
      const buffer = await fs.readFile(sourcePath);
      content = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
      if (isAccessError(error)) {
        throw new SourceNotFoundError(sourcePath, error);
      }
      throw new ExtractionError(sourcePath, error);
    }

    return this.splitChapters(content);
  }

  /**
   * Splits manuscript text into trimmed chapters
   * @param content - The whole manuscript
   * @returns The chapters, in order
   */
  public splitChapters(content: string): string[] {
    const chapters: string[] = [];
    let current: string[] = [];

    const flush = () => {
      const text = current.join('\n').trim();
      if (text.length > 0) {
        chapters.push(text);
      }
      current = [];
    };

    for (const line of content.replace(/^\uFEFF/, '').split(/\r?\n/)) {
      if (this.heading.test(line)) {
        flush();
      }
      current.push(line);
    }
    flush();

    return chapters;
  }
}
