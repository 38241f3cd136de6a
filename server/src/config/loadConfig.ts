import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createHash } from 'node:crypto';
import Ajv, { type ErrorObject } from 'ajv';
import { COURSE_FIELDS, type CourseField } from '../catalog/course';

export type AppConfig = {
  storage: {
    courseFile: string;
  };
  telemetry: {
    file: string;
    flushDebounceMs: number;
    restoreOnStart: boolean;
  };
  courses: {
    requiredFields: CourseField[];
  };
};

export type ConfigError = {
  path: string;
  message: string;
};

export type ConfigResult = {
  config: AppConfig | null;
  hash: string | null;
  errors?: ConfigError[];
};

export const appConfigSchema = {
  type: 'object',
  properties: {
    storage: {
      type: 'object',
      properties: {
        courseFile: { type: 'string', minLength: 1 },
      },
      required: ['courseFile'],
      additionalProperties: false,
    },
    telemetry: {
      type: 'object',
      properties: {
        file: { type: 'string', minLength: 1 },
        flushDebounceMs: { type: 'integer', minimum: 0 },
        restoreOnStart: { type: 'boolean' },
      },
      required: ['file', 'flushDebounceMs', 'restoreOnStart'],
      additionalProperties: false,
    },
    courses: {
      type: 'object',
      properties: {
        requiredFields: {
          type: 'array',
          items: { type: 'string', enum: [...COURSE_FIELDS] },
          uniqueItems: true,
        },
      },
      required: ['requiredFields'],
      additionalProperties: false,
    },
  },
  required: ['storage', 'telemetry', 'courses'],
  additionalProperties: false,
} as const;

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const defaultConfigPath = path.resolve(__dirname, '../../config/catalog.json');

const readMissingProperty = (params: ErrorObject['params']) => {
  const value: unknown = 'missingProperty' in params ? params.missingProperty : undefined;
  return typeof value === 'string' ? value : '';
};

const formatAjvErrors = (errors?: ErrorObject[] | null): ConfigError[] => {
  if (!errors) return [];
  return errors.map((error) => {
    const instancePath = error.instancePath ? error.instancePath.replace(/^\//, '').replaceAll('/', '.') : '';
    const missingProperty = readMissingProperty(error.params);
    const path = instancePath && missingProperty ? `${instancePath}.${missingProperty}` : instancePath || missingProperty || 'root';
    return {
      path,
      message: error.message ?? 'Validation error.',
    };
  });
};

const ajv = new Ajv({ allErrors: true });
const validateAppConfig = ajv.compile<AppConfig>(appConfigSchema);

export const applyEnvOverrides = (config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const debounce = Number(env.TELEMETRY_FLUSH_DEBOUNCE_MS);
  return {
    storage: {
      courseFile: env.COURSE_FILE?.trim() || config.storage.courseFile,
    },
    telemetry: {
      ...config.telemetry,
      file: env.TELEMETRY_FILE?.trim() || config.telemetry.file,
      flushDebounceMs:
        env.TELEMETRY_FLUSH_DEBOUNCE_MS !== undefined && Number.isInteger(debounce) && debounce >= 0
          ? debounce
          : config.telemetry.flushDebounceMs,
    },
    courses: { requiredFields: [...config.courses.requiredFields] },
  };
};

export const loadConfig = (configPath = process.env.CATALOG_CONFIG_PATH || defaultConfigPath): ConfigResult => {
  try {
    const raw = readFileSync(configPath, 'utf-8');
    const hash = createHash('sha256').update(raw).digest('hex');
    const parsedJson: unknown = JSON.parse(raw);
    if (!validateAppConfig(parsedJson)) {
      const errors = formatAjvErrors(validateAppConfig.errors);
      return { config: null, hash, errors };
    }

    return { config: applyEnvOverrides(parsedJson), hash };
  } catch (error) {
    const message = error instanceof Error ? error.message : `Unknown error reading ${configPath}.`;
    return {
      config: null,
      hash: null,
      errors: [{ path: 'root', message }],
    };
  }
};

export const validateConfigData = (data: unknown) => {
  if (!validateAppConfig(data)) {
    return { ok: false as const, errors: formatAjvErrors(validateAppConfig.errors) };
  }
  return { ok: true as const, config: data };
};
