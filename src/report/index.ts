import { MarkdownReportRenderer } from './markdown-renderer.js';
import { PlainTextReportRenderer } from './plain-text-renderer.js';
import type { ReportFormat, ReportRenderer } from './renderer.js';

export * from './renderer.js';
export { MarkdownReportRenderer, formatCount, formatCurrency, parseOverviewTotal } from './markdown-renderer.js';
export { PlainTextReportRenderer } from './plain-text-renderer.js';

export interface RendererOptions {
  frequencyLimit?: number;
}

/**
 * Creates the renderer for a report format
 * @param format - The report layout
 * @param options - Layout options
 * @returns The renderer
 */
export function createRenderer(format: ReportFormat, options: RendererOptions = {}): ReportRenderer {
  switch (format) {
    case 'text':
      return new PlainTextReportRenderer();
    case 'markdown':
      return new MarkdownReportRenderer(options.frequencyLimit);
  }
}
