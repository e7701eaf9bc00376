import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
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

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'csv-upload';

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

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function describePath(path: (string | number)[], description?: string): string {
  return describe(path.length > 0 ? path[path.length - 1] : undefined, description);
}

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

export type IntegerVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
  };

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describePath(ctx.path, options?.description);

    if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    let parsed = Number.NaN;
    if (typeof value === 'number') {
      parsed = value;
    } else if (INTEGER_PATTERN.test(value.trim())) {
      parsed = Number(value.trim());
    }
    if (!Number.isSafeInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption & DefaultOption<string> & DescriptionOption;

/** Values are trimmed; blank ones count as unset and fall back to the default or fail when required. */
export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const description = describePath(ctx.path, options?.description);
    const normalized = value?.trim();

    if (normalized === undefined || normalized.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    return normalized;
  });
}

export type JsonVarOptions<T> = RequiredOption &
  DefaultOption<T> &
  DescriptionOption & {
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  };

export function jsonVar<T>(options: JsonVarOptions<T>) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describePath(ctx.path, options.description);

    if (value === null || value === undefined || value.trim() === '') {
      if (options.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Failed to parse ${description} as JSON (${reason})`
      });
      return z.NEVER;
    }

    const result = options.schema.safeParse(parsed);
    if (!result.success) {
      const [firstIssue] = result.error.issues;
      const message = firstIssue?.message ?? 'does not match expected structure';
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} ${message}`
      });
      return z.NEVER;
    }
    return result.data;
  });
}
