import fs from 'fs-extra';
import path from 'path';
import yaml from 'js-yaml';
import chalk from 'chalk';
import { ConfigurationError } from '../analysis/errors.js';
import {
  type AppConfig,
  DEFAULT_EXTRACTION_CONFIG,
  DEFAULT_PRICING_CONFIG,
  DEFAULT_REPORT_CONFIG,
  type PricingModelConfig,
} from './config.js';
import { appConfigSchema, formatIssues } from './schema.js';

/**
 * ConfigBuilder class for managing application configuration
 */
export class ConfigBuilder {
  private static instance: ConfigBuilder | null = null;
  private static testConfigDir: string | null = null;
  private config: AppConfig;
  private configDir: string;
  private configFile: string;

  /**
   * Private constructor to enforce singleton pattern
   */
  private constructor() {
    this.configDir = ConfigBuilder.testConfigDir || path.join(process.cwd(), '.book-stats');
    this.configFile = path.join(this.configDir, 'config.yaml');

    // Load or create default configuration
    this.config = this.loadConfig();
  }

  /**
   * Get the singleton instance of ConfigBuilder
   * @returns The ConfigBuilder instance
   */
  public static getInstance(): ConfigBuilder {
    if (!ConfigBuilder.instance) {
      ConfigBuilder.instance = new ConfigBuilder();
    }
    return ConfigBuilder.instance;
  }

  /**
   * Set a custom config directory for testing
   * This will reset the singleton instance
   * @param configDir - The custom config directory
   */
  public static setTestConfigDir(configDir: string | null): void {
    ConfigBuilder.testConfigDir = configDir;
    ConfigBuilder.instance = null;
  }

  /**
   * Get the default configuration
   * @returns The default configuration
   */
  public static getDefaultConfig(): AppConfig {
    return {
      pricing: {
        models: DEFAULT_PRICING_CONFIG.models.map((model) => ({ ...model })),
      },
      report: { ...DEFAULT_REPORT_CONFIG },
      extraction: { ...DEFAULT_EXTRACTION_CONFIG },
    };
  }

  /**
   * Loads the configuration from the config file
   * If the file doesn't exist, creates it with default values
   * @returns The configuration object
   */
  public loadConfig(): AppConfig {
    fs.ensureDirSync(this.configDir);

    try {
      if (!fs.existsSync(this.configFile)) {
        console.log(chalk.yellow('Configuration file not found. Creating with default values...'));
        const defaultConfig = ConfigBuilder.getDefaultConfig();
        this.saveConfig(defaultConfig);
        return defaultConfig;
      }

      const configYaml = fs.readFileSync(this.configFile, 'utf8');
      const parsed = appConfigSchema.safeParse(yaml.load(configYaml));
      if (!parsed.success) {
        throw new ConfigurationError(formatIssues(parsed.error));
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error loading configuration: ${error.message}`));
      } else {
        console.error(chalk.red('Error loading configuration: Unknown error'));
      }
      console.log(chalk.yellow('Using default configuration...'));
      return ConfigBuilder.getDefaultConfig();
    }
  }

  /**
   * Saves the configuration to the config file
   * @param config - The configuration object to save
   */
  public saveConfig(config: AppConfig): void {
    fs.ensureDirSync(this.configDir);

    try {
      const configYaml = yaml.dump(config, { indent: 2 });
      fs.writeFileSync(this.configFile, configYaml, 'utf8');
      this.config = config;
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error saving configuration: ${error.message}`));
      } else {
        console.error(chalk.red('Error saving configuration: Unknown error'));
      }
    }
  }

  /**
   * Updates a specific configuration value
   * @param key - The key to update (dot notation supported, e.g. "pricing.models.0.pricePer1000")
   * @param value - The value to set
   * @returns The updated configuration
   * @throws ConfigurationError if the result does not validate
   */
  public updateConfig(key: string, value: unknown): AppConfig {
    // Work on a copy so a rejected update leaves the current config untouched
    const configCopy: unknown = JSON.parse(JSON.stringify(this.config));
    const keys = key.split('.');
    let current = configCopy;

    for (let i = 0; i < keys.length - 1; i++) {
      if (!isRecord(current)) {
        throw new ConfigurationError([`${keys.slice(0, i).join('.')}: not an object`]);
      }
      if (!isRecord(current[keys[i]])) {
        current[keys[i]] = {};
      }
      current = current[keys[i]];
    }

    if (!isRecord(current)) {
      throw new ConfigurationError([`${key}: not an object`]);
    }
    current[keys[keys.length - 1]] = value;

    const parsed = appConfigSchema.safeParse(configCopy);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error));
    }

    this.saveConfig(parsed.data);
    return this.config;
  }

  /**
   * Gets the current configuration
   * @returns The current configuration
   */
  public getConfig(): AppConfig {
    return this.config;
  }

  public getConfigFile(): string {
    return this.configFile;
  }

  /**
   * Gets the configured pricing models, in report order
   * @returns The pricing models
   */
  public getPricingModels(): PricingModelConfig[] {
    return this.config.pricing.models;
  }

  /**
   * Gets a pricing model by name
   * @param name - The model name
   * @returns The model, or undefined when it is not configured
   */
  public getPricingModel(name: string): PricingModelConfig | undefined {
    return this.config.pricing.models.find((model) => model.name === name);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
