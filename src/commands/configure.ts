import chalk from 'chalk';
import inquirer from 'inquirer';
import { updateConfig, type AppConfig } from '../config/config.js';
import { TIKTOKEN_ENCODINGS } from '../config/schema.js';
import { REPORT_FORMATS, type ReportFormat } from '../report/renderer.js';

/**
 * Interface for command options
 */
export interface ConfigureOptions {
  list?: boolean;
  set?: string;
}

/**
 * Answers for a pricing model
 */
type PricingModelAnswers = {
  name: string;
  pricePer1000: number;
  encoding: (typeof TIKTOKEN_ENCODINGS)[number];
};

/**
 * Answers for the report section
 */
type ReportAnswers = {
  format: ReportFormat;
  frequencyLimit: number;
};

/**
 * Configures settings
 * @param options - Command options
 * @param config - The configuration
 */
export async function configureSettings(options: ConfigureOptions, config: AppConfig): Promise<void> {
  // List current configuration
  if (options.list) {
    listConfiguration(config);
    return;
  }

  // Set a configuration value
  if (options.set) {
    setConfigurationValue(options.set);
    return;
  }

  // Interactive configuration
  await interactiveConfiguration(config);
}

/**
 * Lists the current configuration
 * @param config - The configuration
 */
export function listConfiguration(config: AppConfig): void {
  console.log(chalk.cyan('Current configuration:'));

  console.log(chalk.yellow('\nPricing Models:'));
  if (config.pricing.models.length === 0) {
    console.log(chalk.red('  No pricing models configured'));
  }
  config.pricing.models.forEach((model, index) => {
    console.log(chalk.cyan(`\n  [${index}] ${model.name}:`));
    console.log(`    Price per 1000 tokens: ${chalk.blue(model.pricePer1000)}`);
    console.log(`    Encoding: ${chalk.blue(model.encoding)}`);
  });

  console.log(chalk.yellow('\nReport:'));
  console.log(`  Format: ${chalk.blue(config.report.format)}`);
  console.log(`  Frequency Limit: ${chalk.blue(config.report.frequencyLimit)}`);

  console.log(chalk.yellow('\nExtraction:'));
  console.log(`  Chapter Heading: ${chalk.blue(config.extraction.chapterHeading)}`);
}

/**
 * Converts a command-line value to a boolean, number or string
 * @param value - The raw value
 * @returns The typed value
 */
export function parseConfigValue(value: string): string | boolean | number {
  if (value.toLowerCase() === 'true') {
    return true;
  }
  if (value.toLowerCase() === 'false') {
    return false;
  }
  if (!isNaN(Number(value)) && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

/**
 * Sets a configuration value
 * @param keyValue - The key=value string
 */
function setConfigurationValue(keyValue: string): void {
  const separator = keyValue.indexOf('=');

  if (separator <= 0) {
    console.error(chalk.red('Invalid format. Use key=value'));
    return;
  }

  const key = keyValue.slice(0, separator);
  const typedValue = parseConfigValue(keyValue.slice(separator + 1));

  try {
    updateConfig(key, typedValue);
    console.log(chalk.green(`Configuration updated: ${key} = ${typedValue}`));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error updating configuration: ${error.message}`));
    } else {
      console.error(chalk.red('Error updating configuration: Unknown error'));
    }
  }
}

/**
 * Interactive configuration
 * @param config - The configuration
 */
async function interactiveConfiguration(config: AppConfig): Promise<void> {
  type SectionAnswer = {
    section: 'pricing' | 'report' | 'extraction' | 'exit';
  };

  const { section } = await inquirer.prompt<SectionAnswer>([
    {
      type: 'list',
      name: 'section',
      message: 'Which section would you like to configure?',
      choices: [
        { name: 'Pricing Models', value: 'pricing' },
        { name: 'Report', value: 'report' },
        { name: 'Chapter Extraction', value: 'extraction' },
        { name: 'Exit', value: 'exit' }
      ]
    }
  ]);

  switch (section) {
    case 'pricing':
      await configurePricingModel(config);
      break;
    case 'report':
      await configureReport(config);
      break;
    case 'extraction':
      await configureExtraction(config);
      break;
    case 'exit':
      break;
  }
}

/**
 * Adds a pricing model or edits an existing one by name
 * @param config - The configuration
 */
async function configurePricingModel(config: AppConfig): Promise<void> {
  const answers = await inquirer.prompt<PricingModelAnswers>([
    {
      type: 'input',
      name: 'name',
      message: 'Model name:',
      validate: (value: string) => value.trim() ? true : 'Model name is required'
    },
    {
      type: 'number',
      name: 'pricePer1000',
      message: 'Price per 1000 tokens:',
      default: (answers: Partial<PricingModelAnswers>) =>
        config.pricing.models.find((model) => model.name === answers.name)?.pricePer1000 ?? 0,
      validate: (value: number) => value >= 0 ? true : 'Must not be negative'
    },
    {
      type: 'list',
      name: 'encoding',
      message: 'Token encoding:',
      choices: [...TIKTOKEN_ENCODINGS],
      default: 'o200k_base'
    }
  ]);

  const existing = config.pricing.models.findIndex((model) => model.name === answers.name);
  const index = existing === -1 ? config.pricing.models.length : existing;
  updateConfig(`pricing.models.${index}`, {
    name: answers.name.trim(),
    pricePer1000: answers.pricePer1000,
    encoding: answers.encoding
  });

  console.log(chalk.green(`Pricing model ${answers.name} ${existing === -1 ? 'added' : 'updated'}`));
}

/**
 * Configures the report layout
 * @param config - The configuration
 */
async function configureReport(config: AppConfig): Promise<void> {
  const answers = await inquirer.prompt<ReportAnswers>([
    {
      type: 'list',
      name: 'format',
      message: 'Report format:',
      choices: [...REPORT_FORMATS],
      default: config.report.format
    },
    {
      type: 'number',
      name: 'frequencyLimit',
      message: 'Words listed in the Markdown frequency table:',
      default: config.report.frequencyLimit,
      when: (answers: Partial<ReportAnswers>) => answers.format === 'markdown',
      validate: (value: number) => Number.isInteger(value) && value >= 0 ? true : 'Must be a whole number'
    }
  ]);

  updateConfig('report.format', answers.format);
  if (answers.format === 'markdown') {
    updateConfig('report.frequencyLimit', answers.frequencyLimit);
  }

  console.log(chalk.green('Report configuration updated'));
}

/**
 * Configures chapter extraction
 * @param config - The configuration
 */
async function configureExtraction(config: AppConfig): Promise<void> {
  const answers = await inquirer.prompt<{ chapterHeading: string }>([
    {
      type: 'input',
      name: 'chapterHeading',
      message: 'Chapter heading pattern (regular expression):',
      default: config.extraction.chapterHeading
    }
  ]);

  updateConfig('extraction.chapterHeading', answers.chapterHeading);

  console.log(chalk.green('Extraction configuration updated'));
}
