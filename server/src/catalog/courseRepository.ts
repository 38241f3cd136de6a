import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Ajv, { type ErrorObject } from 'ajv';
import { COURSE_FIELDS, type Course } from './course';

export class CourseFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseFileError';
  }
}

const courseSchema = {
  type: 'object',
  properties: Object.fromEntries(COURSE_FIELDS.map((field) => [field, { type: 'string' }])),
  required: [...COURSE_FIELDS],
} as const;

const courseListSchema = {
  type: 'array',
  items: courseSchema,
} as const;

const ajv = new Ajv({ allErrors: true });
const validateCourseList = ajv.compile<Course[]>(courseListSchema);

const describeErrors = (errors?: ErrorObject[] | null) =>
  (errors ?? []).map((error) => `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`).join('; ');

const isMissingFile = (error: unknown) => (error as { code?: string })?.code === 'ENOENT';

export class CourseRepository {
  private writes: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async list(): Promise<Course[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'invalid JSON';
      throw new CourseFileError(`${this.filePath}: ${message}`);
    }

    if (!validateCourseList(parsed)) {
      throw new CourseFileError(`${this.filePath}: ${describeErrors(validateCourseList.errors)}`);
    }
    return parsed;
  }

  async findByCode(code: string): Promise<Course | null> {
    const courses = await this.list();
    return courses.find((course) => course.code === code) ?? null;
  }

  append(course: Course): Promise<Course> {
    const write = this.writes.then(async () => {
      const courses = await this.list();
      courses.push(course);
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(courses, null, 4), 'utf-8');
      return course;
    });
    this.writes = write.catch(() => undefined);
    return write;
  }
}
