import type { z } from 'zod';
import { DEFAULT_CHAPTER_HEADING } from '../extraction/chapter-extractor.js';
import { ConfigBuilder } from './config-builder.js';
import type { appConfigSchema, pricingModelSchema } from './schema.js';

/**
 * Interface for a configured pricing model
 */
export type PricingModelConfig = z.infer<typeof pricingModelSchema>;

/**
 * Interface for the complete application configuration
 */
export type AppConfig = z.infer<typeof appConfigSchema>;

export type PricingConfig = AppConfig['pricing'];
export type ReportConfig = AppConfig['report'];
export type ExtractionConfig = AppConfig['extraction'];

// Export functions from ConfigBuilder for convenience
export function loadConfig(): AppConfig {
  return ConfigBuilder.getInstance().getConfig();
}

export function saveConfig(config: AppConfig): void {
  ConfigBuilder.getInstance().saveConfig(config);
}

export function updateConfig(key: string, value: unknown): AppConfig {
  return ConfigBuilder.getInstance().updateConfig(key, value);
}

// Prices are per 1000 input tokens
export const DEFAULT_PRICING_CONFIG: PricingConfig = {
  models: [
    { name: 'gpt-4o-mini', pricePer1000: 0.00015, encoding: 'o200k_base' },
    { name: 'gpt-4o', pricePer1000: 0.0025, encoding: 'o200k_base' },
  ],
};

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  format: 'markdown',
  frequencyLimit: 200,
};

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  chapterHeading: DEFAULT_CHAPTER_HEADING,
};
