import { once } from 'node:events';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import type { Server } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { DEFAULT_REQUIRED_FIELDS } from '../catalog/course';
import { CourseRepository } from '../catalog/courseRepository';
import { Telemetry, type MetricsSnapshot, type TelemetrySink } from '../telemetry';

class MemorySink implements TelemetrySink {
  readonly written: MetricsSnapshot[] = [];

  async flush(snapshot: MetricsSnapshot): Promise<void> {
    this.written.push(snapshot);
  }
}

let dir: string;
let courseFile: string;
let telemetry: Telemetry;
let server: Server | null = null;

const start = async () => {
  const app = createApp({
    courses: new CourseRepository(courseFile),
    telemetry,
    requiredFields: DEFAULT_REQUIRED_FIELDS,
  });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (typeof address !== 'object' || address === null) throw new Error('server has no port');
  return `http://127.0.0.1:${address.port}`;
};

beforeEach(() => {
  dir = mkdtempSync(path.join(os.tmpdir(), 'catalog-app-'));
  courseFile = path.join(dir, 'course_catalog.json');
  telemetry = new Telemetry({ sink: new MemorySink(), logger: pino({ level: 'silent' }) });
});

afterEach(async () => {
  if (server) {
    const closing = server;
    server = null;
    closing.closeAllConnections();
    await new Promise<void>((resolve, reject) => closing.close((error) => (error ? reject(error) : resolve())));
  }
  await telemetry.close();
  rmSync(dir, { recursive: true, force: true });
});

describe('createApp', () => {
  it('aggregates course lookups under one route name', async () => {
    const baseUrl = await start();

    const first = await fetch(`${baseUrl}/course/A`);
    const second = await fetch(`${baseUrl}/course/B`);

    expect([first.status, second.status]).toEqual([404, 404]);
    expect(await first.json()).toEqual({ error: { message: "No course found with code 'A'" } });
    const snapshot = telemetry.snapshot();
    expect(snapshot.route_requests).toEqual({ course_details: 2 });
    expect(Object.keys(snapshot.route_processing_time)).toEqual(['course_details']);
    expect(snapshot.errors).toEqual({
      "No course found with code 'A'": 1,
      "No course found with code 'B'": 1,
    });
  });

  it('counts unmatched paths as not_found', async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { message: 'Not found', details: 'GET /nope' } });
    expect(telemetry.snapshot().route_requests).toEqual({ not_found: 1 });
  });

  it('counts malformed JSON bodies as bad_request', async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/submit_detail`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{bad',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { message: 'Invalid request' } });
    expect(telemetry.snapshot().route_requests).toEqual({ bad_request: 1 });
  });

  it('answers 500 for a handler fault and counts it once', async () => {
    writeFileSync(courseFile, 'not json');
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/catalog`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: { message: 'Internal server error' } });
    const snapshot = telemetry.snapshot();
    expect(snapshot.route_requests).toEqual({ course_catalog: 1 });
    expect(Object.keys(snapshot.route_processing_time)).toEqual(['course_catalog']);
  });

  it('rejects a submission sent without a body', async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/submit_detail`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { message: 'Missing required fields: code, name, instructor, semester' },
      missing: ['code', 'name', 'instructor', 'semester'],
    });
    expect(telemetry.snapshot()).toEqual({
      route_requests: { submit_course: 1 },
      route_processing_time: { submit_course: expect.any(Number) },
      errors: { 'Missing required fields: code, name, instructor, semester': 1 },
    });
  });

  it('adds a posted course and reports it from the catalog', async () => {
    const baseUrl = await start();

    const created = await fetch(`${baseUrl}/submit_detail`, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'code=CS101&name=Intro&instructor=Rivera&semester=Fall',
    });
    const catalog = await fetch(`${baseUrl}/catalog`);

    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ message: "Course 'Intro' has been successfully added!" });
    expect(await catalog.json()).toEqual({
      courses: [
        {
          code: 'CS101',
          name: 'Intro',
          instructor: 'Rivera',
          semester: 'Fall',
          schedule: '',
          classroom: '',
          prerequisites: '',
          grading: '',
          description: '',
        },
      ],
    });
    expect(telemetry.snapshot().route_requests).toEqual({ submit_course: 1, course_catalog: 1 });
  });
});
