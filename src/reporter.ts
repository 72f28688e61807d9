/**
 * Course Reporter
 * Builds the course listing and single-course detail views
 */

import { normalizeCourseNumber } from './parsers/courseLineParser.js';
import type { CourseTree } from './store/courseTree.js';
import type { Course, CourseDescription, ResolvedPrerequisite } from './types.js';

export const NO_COURSES_MESSAGE = 'No courses loaded.';

export function formatCourseLine(course: Course): string {
  return `${course.courseNumber}, ${course.courseTitle}`;
}

/**
 * All courses in ascending course-number order, one "<number>, <title>" line each
 */
export function listCourses(store: CourseTree): string[] {
  if (store.isEmpty()) {
    return [NO_COURSES_MESSAGE];
  }
  const lines: string[] = [];
  store.forEachInOrder(course => lines.push(formatCourseLine(course)));
  return lines;
}

/**
 * Look up a course and resolve each prerequisite against the store.
 * Prerequisites missing from the store are marked dangling, not dropped.
 */
export function describeCourse(courseNumber: string, store: CourseTree): CourseDescription {
  const key = normalizeCourseNumber(courseNumber);
  const course = store.find(key);

  if (!course) {
    return { found: false, courseNumber: key };
  }

  const prerequisites = course.prerequisites.map((id): ResolvedPrerequisite => {
    const prereq = store.find(id);
    return prereq
      ? { courseNumber: prereq.courseNumber, courseTitle: prereq.courseTitle, dangling: false }
      : { courseNumber: normalizeCourseNumber(id), dangling: true };
  });

  return { found: true, course, prerequisites };
}

export function renderDescription(description: CourseDescription): string[] {
  if (!description.found) {
    return [`Course ${description.courseNumber} not found.`];
  }

  const lines = [formatCourseLine(description.course)];

  if (description.prerequisites.length === 0) {
    lines.push('Prerequisites: None');
    return lines;
  }

  lines.push('Prerequisites:');
  for (const prereq of description.prerequisites) {
    lines.push(prereq.dangling
      ? `  ${prereq.courseNumber} (course not found in data)`
      : `  ${prereq.courseNumber}, ${prereq.courseTitle}`);
  }
  return lines;
}

export function describe(courseNumber: string, store: CourseTree): string {
  return renderDescription(describeCourse(courseNumber, store)).join('\n');
}
