/**
 * Configuration Loader
 *
 * Resolves each schema field from the environment (or an injected source map),
 * converts it by type, and reports every invalid field in one
 * ConfigurationError. Typed getters refuse values of the wrong shape.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigurationError } from '@graphfeed/errors';
import { checkValues } from './field-checks';
import { ConfigEnvironment, ConfigLoaderOptions, EnvField, EnvSchema, FieldIssue } from './types';

const ENVIRONMENTS: readonly ConfigEnvironment[] = ['development', 'production', 'test', 'staging'];
const TRUTHY = new Set(['true', '1', 'yes']);

function convert(raw: string, field: EnvField): unknown {
  if (field.parse) {
    return field.parse(raw);
  }
  switch (field.type) {
    case 'number':
      // A non-numeric string is kept so the type check can name it
      return Number.isNaN(Number(raw)) ? raw : Number(raw);
    case 'boolean':
      return TRUTHY.has(raw.toLowerCase());
    case 'list':
      return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
    default:
      return raw;
  }
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export class ConfigLoader {
  private readonly schema: EnvSchema;
  private readonly source: Record<string, string | undefined>;
  private readonly environment: ConfigEnvironment;
  private readonly envFilePath: string;
  private readonly readEnvFile: boolean;
  private readonly throwOnValidationError: boolean;
  private values: Record<string, unknown> | null = null;
  private issues: FieldIssue[] = [];

  constructor(options: ConfigLoaderOptions) {
    this.schema = options.schema;
    this.source = options.source ?? process.env;
    this.environment =
      options.environment ?? ENVIRONMENTS.find((env) => env === this.source.NODE_ENV) ?? 'development';
    this.envFilePath = options.envFilePath ?? '.env';
    this.readEnvFile = options.loadEnvFile ?? options.source === undefined;
    this.throwOnValidationError = options.throwOnValidationError ?? true;
  }

  async load(): Promise<Record<string, unknown>> {
    if (this.values) {
      return this.values;
    }

    if (this.readEnvFile) {
      // A missing file is fine: variables may come from the process environment
      dotenv.config({ path: path.resolve(process.cwd(), this.envFilePath) });
    }

    const values: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(this.schema)) {
      const raw = this.lookup(key, field);
      values[key] = raw === undefined ? field.default : convert(raw, field);
    }

    this.issues = checkValues(values, this.schema);
    if (this.issues.length > 0 && this.throwOnValidationError) {
      const lines = this.issues.map((issue) => `  - ${issue.field}: ${issue.message}`).join('\n');
      throw new ConfigurationError(`Configuration validation failed:\n${lines}`, {
        fields: this.issues.map((issue) => issue.field),
      });
    }

    this.values = values;
    return values;
  }

  get(key: string): unknown {
    if (!this.values) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.values[key];
  }

  getString(key: string): string {
    const value = this.get(key);
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Configuration key '${key}' is not a string`, { key });
    }
    return value;
  }

  getOptionalString(key: string): string | undefined {
    const value = this.get(key);
    return value === undefined || value === '' ? undefined : this.getString(key);
  }

  getNumber(key: string): number {
    const value = this.get(key);
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigurationError(`Configuration key '${key}' is not a number`, { key });
    }
    return value;
  }

  getOptionalNumber(key: string): number | undefined {
    return this.get(key) === undefined ? undefined : this.getNumber(key);
  }

  getBoolean(key: string): boolean {
    const value = this.get(key);
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(`Configuration key '${key}' is not a boolean`, { key });
    }
    return value;
  }

  getStringList(key: string): string[] {
    const value = this.get(key);
    if (!isStringList(value)) {
      throw new ConfigurationError(`Configuration key '${key}' is not a list`, { key });
    }
    return value;
  }

  /** Issues found by the last load; only kept when not throwing */
  getValidationIssues(): FieldIssue[] {
    return [...this.issues];
  }

  getEnvironment(): ConfigEnvironment {
    return this.environment;
  }

  isProduction(): boolean {
    return this.environment === 'production';
  }

  private lookup(key: string, field: EnvField): string | undefined {
    const names = field.env === undefined ? [key.toUpperCase()] : typeof field.env === 'string' ? [field.env] : field.env;
    return names.map((name) => this.source[name]).find((value) => value !== undefined && value !== '');
  }
}
