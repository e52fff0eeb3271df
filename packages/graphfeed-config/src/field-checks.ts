import { z } from 'zod';
import { EnvSchema, EnvValueType, FieldIssue } from './types';

const TYPE_RULES: Record<EnvValueType, { schema: z.ZodTypeAny; message: string }> = {
  string: { schema: z.string(), message: 'Must be a string' },
  number: { schema: z.number().finite(), message: 'Must be a number' },
  boolean: { schema: z.boolean(), message: 'Must be a boolean' },
  url: { schema: z.string().url(), message: 'Must be a valid URL' },
  list: { schema: z.array(z.string()), message: 'Must be a comma-separated list' },
};

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Check resolved values against their fields, in schema order.
 * A field reports at most one issue: missing, wrong type, or failed check.
 */
export function checkValues(values: Record<string, unknown>, schema: EnvSchema): FieldIssue[] {
  const issues: FieldIssue[] = [];

  for (const [field, spec] of Object.entries(schema)) {
    const value = values[field];

    if (isBlank(value)) {
      if (spec.required) {
        issues.push({ field, message: 'Required field is missing', value });
      }
      continue;
    }

    const shown = spec.secret ? '[redacted]' : value;

    if (spec.type && !TYPE_RULES[spec.type].schema.safeParse(value).success) {
      issues.push({ field, message: TYPE_RULES[spec.type].message, value: shown });
      continue;
    }

    const verdict = spec.check?.(value) ?? true;
    if (verdict !== true) {
      issues.push({ field, message: verdict, value: shown });
    }
  }

  return issues;
}
