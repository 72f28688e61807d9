/**
 * Course Line Parser
 * Turns one line of a course data file into a Course record
 *
 * Examples:
 * - "CS200,Data Structures,CS100" -> { courseNumber: "CS200", courseTitle: "Data Structures", prerequisites: ["CS100"] }
 * - "CS101,Intro,CS100,"          -> prerequisites: ["CS100"] (empty fields dropped)
 * - "CS101"                       -> format error (fewer than two fields)
 * - "CS101,"                      -> missing course title
 */

import type { Course } from '../types.js';

export const FIELD_DELIMITER = ',';

export type ParsedLine =
  | { status: 'ok'; course: Course }
  | { status: 'blank' }
  | { status: 'format-error'; fieldCount: number }
  | { status: 'missing-field'; field: 'courseNumber' | 'courseTitle' };

/**
 * Normalize course number format: trimmed, uppercase
 */
export function normalizeCourseNumber(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Split on the delimiter and trim every field (spaces, tabs, CR, LF)
 */
export function splitFields(line: string, delimiter: string = FIELD_DELIMITER): string[] {
  return line.split(delimiter).map(field => field.trim());
}

export function parseCourseLine(line: string): ParsedLine {
  if (line.trim() === '') {
    return { status: 'blank' };
  }

  const fields = splitFields(line);
  if (fields.length < 2) {
    return { status: 'format-error', fieldCount: fields.length };
  }

  const [courseNumber, courseTitle, ...rest] = fields;
  if (!courseNumber) {
    return { status: 'missing-field', field: 'courseNumber' };
  }
  if (!courseTitle) {
    return { status: 'missing-field', field: 'courseTitle' };
  }

  const prerequisites = rest
    .filter(id => id !== '')
    .map(normalizeCourseNumber);

  return {
    status: 'ok',
    course: {
      courseNumber: normalizeCourseNumber(courseNumber),
      courseTitle,
      prerequisites,
    },
  };
}
