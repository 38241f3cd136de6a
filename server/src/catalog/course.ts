export const COURSE_FIELDS = [
  'code',
  'name',
  'instructor',
  'semester',
  'schedule',
  'classroom',
  'prerequisites',
  'grading',
  'description',
] as const;

export type CourseField = (typeof COURSE_FIELDS)[number];

export type Course = Record<CourseField, string>;

export const DEFAULT_REQUIRED_FIELDS: readonly CourseField[] = ['code', 'name', 'instructor', 'semester'];

export type CourseValidationResult = { ok: true; course: Course } | { ok: false; missing: CourseField[] };

const readField = (body: Record<string, unknown>, field: CourseField) => {
  const value = body[field];
  return typeof value === 'string' ? value.trim() : '';
};

// Blank or non-string values count as missing.
export const validateCourseInput = (
  body: unknown,
  requiredFields: readonly CourseField[] = DEFAULT_REQUIRED_FIELDS,
): CourseValidationResult => {
  const source: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};
  const course: Course = {
    code: readField(source, 'code'),
    name: readField(source, 'name'),
    instructor: readField(source, 'instructor'),
    semester: readField(source, 'semester'),
    schedule: readField(source, 'schedule'),
    classroom: readField(source, 'classroom'),
    prerequisites: readField(source, 'prerequisites'),
    grading: readField(source, 'grading'),
    description: readField(source, 'description'),
  };

  const missing = COURSE_FIELDS.filter((field) => requiredFields.includes(field) && !course[field]);
  if (missing.length > 0) {
    return { ok: false, missing };
  }
  return { ok: true, course };
};

export const formatMissingFields = (missing: readonly CourseField[]) =>
  `Missing required fields: ${missing.join(', ')}`;

export const courseNotFoundMessage = (code: string) => `No course found with code '${code}'`;

export const courseAddedMessage = (course: Course) => `Course '${course.name}' has been successfully added!`;
