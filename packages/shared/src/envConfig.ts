import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_INVALID';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
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

function formatErrorMessage(context: string, issues: string[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${issue}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: LoadEnvConfigOptions
): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'topograph';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      formatIssue({ path: issue.path, message: issue.message })
    );
    throw new ConfigurationError(formatErrorMessage(context, issues), issues);
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
    max?: number;
  };

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

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

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
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

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption &
  DefaultOption<string> &
  DescriptionOption & {
    trim?: boolean;
    allowEmpty?: boolean;
    lowercase?: boolean;
  };

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === undefined) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const raw = options?.trim === false ? value : value.trim();
    const normalized = options?.lowercase ? raw.toLowerCase() : raw;

    if (!options?.allowEmpty && normalized.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must not be empty` });
        return z.NEVER;
      }
      return undefined;
    }

    return normalized;
  });
}

export type UrlVarOptions = RequiredOption &
  DescriptionOption & {
    protocols?: string[];
  };

export function urlVar(options?: UrlVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);
    const trimmed = value?.trim() ?? '';

    if (trimmed.length === 0) {
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be an absolute URL` });
      return z.NEVER;
    }

    if (options?.protocols && !options.protocols.includes(parsed.protocol.replace(/:$/, ''))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must use one of: ${options.protocols.join(', ')}`
      });
      return z.NEVER;
    }

    return trimmed;
  });
}

export type EnumVarOptions<T extends string> = DescriptionOption & {
  defaultValue: T;
};

export function enumVar<T extends readonly [string, ...string[]]>(
  values: T,
  options: EnumVarOptions<T[number]>
) {
  return z.string().optional().transform((value, ctx): T[number] => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options.description);
    const normalized = value?.trim().toLowerCase() ?? '';

    if (normalized.length === 0) {
      return options.defaultValue;
    }

    const match = values.find((candidate) => candidate === normalized);
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Accepted values: ${values.map((entry) => `'${entry}'`).join(', ')}`
      });
      return z.NEVER;
    }
    return match;
  });
}
