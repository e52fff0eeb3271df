/**
 * @graphfeed/config
 * Environment-driven, schema-checked configuration
 */

export { ConfigLoader } from './config-loader';
export { checkValues } from './field-checks';
export type {
  ConfigEnvironment,
  ConfigLoaderOptions,
  EnvField,
  EnvSchema,
  EnvValueType,
  FieldIssue,
} from './types';
