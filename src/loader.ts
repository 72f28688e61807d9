/**
 * Course Loader
 * Reads course data files into a CourseTree, collecting per-line diagnostics
 */

import * as fs from 'fs';
import { logger } from './logger.js';
import { parseCourseLine } from './parsers/courseLineParser.js';
import type { CourseTree } from './store/courseTree.js';
import type { LoadDiagnostic, LoadResult, LoadSummary } from './types.js';

/**
 * Load courses from source text. The store is cleared first, so loading the
 * same text twice leaves the same contents.
 */
export function loadCourses(sourceText: string, store: CourseTree, source: string = '<text>'): LoadSummary {
  store.clear();

  const lines = sourceText.split('\n');
  // A final newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const diagnostics: LoadDiagnostic[] = [];

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.replace(/\r$/, '');
    const parsed = parseCourseLine(line);

    switch (parsed.status) {
      case 'blank':
        return;
      case 'format-error':
        diagnostics.push({ kind: 'LineFormatError', lineNumber, line, fieldCount: parsed.fieldCount });
        return;
      case 'missing-field':
        diagnostics.push({ kind: 'MissingRequiredField', lineNumber, line, field: parsed.field });
        return;
      case 'ok': {
        const { course } = parsed;
        if (store.find(course.courseNumber)) {
          diagnostics.push({ kind: 'DuplicateCourse', lineNumber, courseNumber: course.courseNumber });
        }
        store.insertOrUpdate(course);
        return;
      }
    }
  });

  for (const diagnostic of diagnostics) {
    logger.debug('Loader', formatDiagnostic(diagnostic));
  }

  logger.debug('Loader', `Loaded ${store.size} courses from ${source}`, {
    linesRead: lines.length,
    diagnostics: diagnostics.length,
    treeHeight: store.height(),
  });

  return {
    source,
    coursesLoaded: store.size,
    linesRead: lines.length,
    diagnostics,
  };
}

/**
 * Load courses from a file. When the file cannot be read the store is left
 * empty and a SourceUnavailable error is returned.
 */
export function loadCourseFile(filePath: string, store: CourseTree): LoadResult {
  store.clear();

  if (filePath.trim() === '') {
    return { ok: false, error: { kind: 'SourceUnavailable', source: filePath, reason: 'empty file name' } };
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error('Loader', `Cannot read ${filePath}: ${reason}`);
    return { ok: false, error: { kind: 'SourceUnavailable', source: filePath, reason } };
  }

  return { ok: true, summary: loadCourses(text, store, filePath) };
}

/**
 * User-facing text for a load diagnostic
 */
export function formatDiagnostic(diagnostic: LoadDiagnostic): string {
  switch (diagnostic.kind) {
    case 'LineFormatError':
      return `File format error on line ${diagnostic.lineNumber}: fewer than two fields. Offending line: ${diagnostic.line}`;
    case 'MissingRequiredField': {
      const field = diagnostic.field === 'courseNumber' ? 'course number' : 'course title';
      return `File format warning on line ${diagnostic.lineNumber}: missing ${field}. Offending line: ${diagnostic.line}`;
    }
    case 'DuplicateCourse':
      return `Line ${diagnostic.lineNumber}: course ${diagnostic.courseNumber} appears more than once; keeping the later entry.`;
  }
}
