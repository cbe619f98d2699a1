import { Value } from '@sinclair/typebox/value';
import { TB } from '../typebox.js';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
    return '[REDACTED]';
  }
  return value;
}

function coerceEnvironmentValue(value: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array': {
      try {
        return JSON.parse(value);
      } catch {
        throw new Error(`Cannot parse "${value}" as JSON`);
      }
    }
    default:
      return value;
  }
}

function extractSchemaType(schema: TB.TSchema): string {
  if (typeof schema.type === 'string') {
    return schema.type;
  }
  if ('anyOf' in schema || 'oneOf' in schema) {
    return 'union';
  }
  return 'unknown';
}

// Values that cannot be coerced are kept as strings so validation reports them.
function coerceEnvValues(source: EnvSource, schema: TB.TSchema): Record<string, unknown> {
  if (typeof schema.properties !== 'object' || schema.properties === null) {
    return { ...source };
  }

  const properties: Record<string, TB.TSchema> = schema.properties;
  const coerced: Record<string, unknown> = {};

  for (const [key, propSchema] of Object.entries(properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, extractSchemaType(propSchema));
    } catch {
      coerced[key] = value;
    }
  }

  return coerced;
}

function convertTypeBoxErrors(
  errors: ReturnType<typeof Value.Errors>,
  redactSensitive: boolean,
): EnvValidationError[] {
  const validationErrors: EnvValidationError[] = [];

  for (const error of errors) {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.');

    validationErrors.push({
      path: path || 'root',
      message: error.message,
      value: redactSensitive ? redactValue(path, error.value) : error.value,
    });
  }

  return validationErrors;
}

function formatValidationErrors(errors: EnvValidationError[]): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const valuePart = error.value !== undefined ? `, received ${JSON.stringify(error.value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

export function createEnvParser(): EnvParser {
  const validate = <T extends TB.TSchema>(
    schema: T,
    source: unknown,
    config: EnvParserConfig = {},
  ): ParsedEnv<TB.Static<T>> => {
    if (Value.Check(schema, source)) {
      return { config: source };
    }

    return {
      errors: convertTypeBoxErrors(Value.Errors(schema, source), config.redactSensitive ?? true),
    };
  };

  const parse = <T extends TB.TSchema>(schema: T, config: EnvParserConfig = {}): TB.Static<T> => {
    const source = config.source ?? process.env;

    const coerced = coerceEnvValues(source, schema);
    const withDefaults = Value.Default(schema, coerced);

    const result = validate(schema, withDefaults, config);

    if (result.errors !== undefined) {
      throw new Error(formatValidationErrors(result.errors));
    }

    return result.config;
  };

  return {
    parse,
    validate,
  };
}

export function createEnvContext<T extends TB.TSchema>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<TB.Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);
  const candidate: unknown = parsedConfig;

  const nodeEnv =
    typeof candidate === 'object' &&
    candidate !== null &&
    'NODE_ENV' in candidate &&
    typeof candidate.NODE_ENV === 'string'
      ? candidate.NODE_ENV
      : 'development';

  return {
    config: parsedConfig,
    nodeEnv,
  };
}
