import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: LoadEnvConfigOptions
): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'engagement-pipeline';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function variableName(ctx: z.RefinementCtx): string {
  const name = ctx.path[ctx.path.length - 1];
  return name === undefined ? 'value' : String(name);
}

const LIST_SEPARATOR = /[,\s]+/;

export type BooleanVarOptions = {
  defaultValue?: boolean;
};

export function booleanVar(options: BooleanVarOptions = {}) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value?.trim().toLowerCase() ?? '';
    if (normalized === '') {
      return options.defaultValue;
    }
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${variableName(ctx)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type StringVarOptions = {
  defaultValue?: string;
  lowercase?: boolean;
};

/** Trimmed string; blank values fall back to `defaultValue`. */
export function stringVar(options: StringVarOptions = {}) {
  const normalize = (value: string) => (options.lowercase ? value.trim().toLowerCase() : value.trim());
  return z.string().optional().transform((value) => {
    const normalized = value === undefined ? '' : normalize(value);
    if (normalized === '') {
      return options.defaultValue === undefined ? undefined : normalize(options.defaultValue);
    }
    return normalized;
  });
}

export type StringListOptions = {
  defaultValue?: string[];
  unique?: boolean;
};

/** Comma or whitespace separated list. */
export function stringListVar(options: StringListOptions = {}) {
  return z.union([z.string(), z.array(z.string())]).nullable().optional().transform((value) => {
    if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
      return options.defaultValue ?? [];
    }
    const list = Array.isArray(value)
      ? value
      : value
          .split(LIST_SEPARATOR)
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0);
    return options.unique ? Array.from(new Set(list)) : list;
  });
}
