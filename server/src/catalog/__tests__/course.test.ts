import { describe, expect, it } from 'vitest';
import { courseAddedMessage, courseNotFoundMessage, formatMissingFields, validateCourseInput } from '../course';

const completeForm = {
  code: ' CS101 ',
  name: 'Intro to Programming',
  instructor: 'Dr. Rivera',
  semester: 'Fall',
  schedule: 'Mon/Wed 10:00',
  classroom: 'B-12',
  prerequisites: 'None',
  grading: 'Projects 60%, Exams 40%',
  description: 'First course in the sequence.',
};

describe('validateCourseInput', () => {
  it('builds a trimmed course from a complete form', () => {
    const result = validateCourseInput(completeForm);
    expect(result).toEqual({ ok: true, course: { ...completeForm, code: 'CS101' } });
  });

  it('defaults optional fields to empty strings', () => {
    const result = validateCourseInput({ code: 'MA201', name: 'Linear Algebra', instructor: 'Lee', semester: 'Spring' });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.course.schedule).toBe('');
      expect(result.course.description).toBe('');
    }
  });

  it('lists blank and absent required fields in field order', () => {
    const result = validateCourseInput({ semester: 'Fall', name: '   ', code: 7 });
    expect(result).toEqual({ ok: false, missing: ['code', 'name', 'instructor'] });
  });

  it('honours a custom required field set', () => {
    const result = validateCourseInput({ code: 'X1' }, ['code', 'grading']);
    expect(result).toEqual({ ok: false, missing: ['grading'] });
  });

  it('treats a non-object body as empty', () => {
    expect(validateCourseInput(undefined, ['code'])).toEqual({ ok: false, missing: ['code'] });
  });
});

describe('course helpers', () => {
  it('formats the missing field message', () => {
    expect(formatMissingFields(['code', 'name'])).toBe('Missing required fields: code, name');
  });

  it('formats the not-found and added messages', () => {
    expect(courseNotFoundMessage('X101')).toBe("No course found with code 'X101'");
    const result = validateCourseInput(completeForm);
    if (!result.ok) throw new Error('expected a valid course');
    expect(courseAddedMessage(result.course)).toBe("Course 'Intro to Programming' has been successfully added!");
  });
});
