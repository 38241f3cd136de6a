import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Ajv, { type ErrorObject } from 'ajv';
import type { MetricsSnapshot } from './metricsStore';

export interface TelemetrySink {
  flush(snapshot: MetricsSnapshot): Promise<void>;
}

export class TelemetryDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelemetryDocumentError';
  }
}

const countMapSchema = {
  type: 'object',
  additionalProperties: { type: 'integer', minimum: 0 },
} as const;

export const telemetryDocumentSchema = {
  type: 'object',
  properties: {
    route_requests: countMapSchema,
    route_processing_time: {
      type: 'object',
      additionalProperties: { type: 'number', minimum: 0 },
    },
    errors: countMapSchema,
  },
  required: ['route_requests', 'route_processing_time', 'errors'],
  additionalProperties: false,
} as const;

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<MetricsSnapshot>(telemetryDocumentSchema);

const describeErrors = (errors?: ErrorObject[] | null) =>
  (errors ?? []).map((error) => `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`).join('; ');

const isMissingFile = (error: unknown) => (error as { code?: string })?.code === 'ENOENT';

// Temp file + rename: the target is always a whole document.
export class JsonFileSink implements TelemetrySink {
  constructor(readonly filePath: string) {}

  async flush(snapshot: MetricsSnapshot): Promise<void> {
    const document: MetricsSnapshot = {
      route_requests: snapshot.route_requests,
      route_processing_time: snapshot.route_processing_time,
      errors: snapshot.errors,
    };
    const tempPath = `${this.filePath}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    await rename(tempPath, this.filePath);
  }

  async load(): Promise<MetricsSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'invalid JSON';
      throw new TelemetryDocumentError(`${this.filePath}: ${message}`);
    }

    if (!validateDocument(parsed)) {
      throw new TelemetryDocumentError(`${this.filePath}: ${describeErrors(validateDocument.errors)}`);
    }
    return parsed;
  }
}
