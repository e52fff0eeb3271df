export type ConfigEnvironment = 'development' | 'production' | 'test' | 'staging';

export type EnvValueType = 'string' | 'number' | 'boolean' | 'url' | 'list';

/**
 * One configuration value read from the environment
 */
export interface EnvField {
  /** Variable name, or names in priority order; defaults to the upper-cased key */
  env?: string | readonly string[];
  type?: EnvValueType;
  default?: unknown;
  required?: boolean;
  /** Redacted in validation reports */
  secret?: boolean;
  /** Replaces the conversion implied by `type` */
  parse?: (raw: string) => unknown;
  /** Extra check on the converted value: true, or the problem */
  check?: (value: unknown) => true | string;
}

export type EnvSchema = Record<string, EnvField>;

export interface ConfigLoaderOptions {
  schema: EnvSchema;
  /** Defaults to NODE_ENV from the source */
  environment?: ConfigEnvironment;
  /** .env file read through dotenv (default: .env in the working directory) */
  envFilePath?: string;
  /** Defaults to true unless `source` is given */
  loadEnvFile?: boolean;
  throwOnValidationError?: boolean;
  /** Variables to read instead of process.env */
  source?: Record<string, string | undefined>;
}

export interface FieldIssue {
  field: string;
  message: string;
  value?: unknown;
}
