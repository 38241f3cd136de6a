import { Router } from 'express';
import {
  COURSE_FIELDS,
  courseAddedMessage,
  courseNotFoundMessage,
  formatMissingFields,
  validateCourseInput,
  type CourseField,
} from '../catalog/course';
import type { CourseRepository } from '../catalog/courseRepository';
import { trackRoute, type RouteHandler, type Telemetry } from '../telemetry';

export const buildErrorResponse = (message: string, details?: string) => ({
  error: {
    message,
    details,
  },
});

export type CatalogRouterDeps = {
  courses: CourseRepository;
  telemetry: Telemetry;
  requiredFields: readonly CourseField[];
};

export const createCatalogHandlers = ({ courses, telemetry, requiredFields }: CatalogRouterDeps) => {
  const index: RouteHandler = (_req, res) => {
    res.json({
      service: 'course-catalog',
      routes: ['/catalog', '/course/:code', '/form', '/submit_detail', '/health', '/metrics'],
    });
  };

  const courseCatalog: RouteHandler = async (_req, res) => {
    res.json({ courses: await courses.list() });
  };

  const courseDetails: RouteHandler = async (req, res) => {
    const code = String(req.params.code ?? '').trim();
    const course = await courses.findByCode(code);
    if (!course) {
      const message = courseNotFoundMessage(code);
      telemetry.reportError(message);
      res.status(404).json(buildErrorResponse(message));
      return;
    }
    res.json({ course });
  };

  const courseForm: RouteHandler = (_req, res) => {
    res.json({
      fields: COURSE_FIELDS.map((name) => ({ name, required: requiredFields.includes(name) })),
    });
  };

  const submitCourse: RouteHandler = async (req, res) => {
    const result = validateCourseInput(req.body, requiredFields);
    if (!result.ok) {
      const message = formatMissingFields(result.missing);
      telemetry.reportError(message);
      res.status(400).json({ ...buildErrorResponse(message), missing: result.missing });
      return;
    }

    const course = await courses.append(result.course);
    res.status(201).json({ course, message: courseAddedMessage(course) });
  };

  return { index, courseCatalog, courseDetails, courseForm, submitCourse };
};

export const createCatalogRouter = (deps: CatalogRouterDeps) => {
  const { telemetry } = deps;
  const handlers = createCatalogHandlers(deps);
  const router = Router();

  router.get('/', trackRoute(telemetry, 'index', handlers.index));
  router.get('/catalog', trackRoute(telemetry, 'course_catalog', handlers.courseCatalog));
  router.get('/course/:code', trackRoute(telemetry, 'course_details', handlers.courseDetails));
  router.get('/form', trackRoute(telemetry, 'course_form', handlers.courseForm));
  router
    .route('/submit_detail')
    .get(trackRoute(telemetry, 'submit_course', handlers.submitCourse))
    .post(trackRoute(telemetry, 'submit_course', handlers.submitCourse));

  return router;
};
