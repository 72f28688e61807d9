/**
 * Course Planner Type Definitions
 */

// ============ Catalog Types ============

export interface Course {
  courseNumber: string;     // "CS200"
  courseTitle: string;      // "Data Structures"
  prerequisites: string[];  // ["CS100", "MATH201"]
}

// ============ Load Types ============

export interface LineFormatError {
  kind: 'LineFormatError';
  lineNumber: number;
  line: string;
  fieldCount: number;
}

export interface MissingRequiredField {
  kind: 'MissingRequiredField';
  lineNumber: number;
  line: string;
  field: 'courseNumber' | 'courseTitle';
}

export interface DuplicateCourse {
  kind: 'DuplicateCourse';
  lineNumber: number;
  courseNumber: string;
}

export type LoadDiagnostic = LineFormatError | MissingRequiredField | DuplicateCourse;

export interface LoadSummary {
  source: string;
  coursesLoaded: number;
  linesRead: number;
  diagnostics: LoadDiagnostic[];
}

export interface SourceUnavailable {
  kind: 'SourceUnavailable';
  source: string;
  reason: string;
}

export type LoadResult =
  | { ok: true; summary: LoadSummary }
  | { ok: false; error: SourceUnavailable };

// ============ Report Types ============

export type ResolvedPrerequisite =
  | { courseNumber: string; courseTitle: string; dangling: false }
  | { courseNumber: string; dangling: true };

export type CourseDescription =
  | { found: true; course: Course; prerequisites: ResolvedPrerequisite[] }
  | { found: false; courseNumber: string };

// ============ Planner Options ============

export interface PlannerConfig {
  dataFile: string | undefined;
  debug: boolean;
  logDir: string | undefined;
}
