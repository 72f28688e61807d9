/**
 * Sanity Checks - flag prerequisite references the loaded catalog cannot resolve
 */

import { logger } from './logger.js';
import type { CourseTree } from './store/courseTree.js';

export interface DanglingReference {
  courseNumber: string;
  prerequisite: string;
}

export interface CatalogCheckResult {
  passed: boolean;
  courseCount: number;
  prerequisiteLinks: number;
  dangling: DanglingReference[];
  selfReferences: string[];
  warnings: string[];
}

/**
 * Check every prerequisite reference in the store
 */
export function checkCatalog(store: CourseTree): CatalogCheckResult {
  const result: CatalogCheckResult = {
    passed: true,
    courseCount: store.size,
    prerequisiteLinks: 0,
    dangling: [],
    selfReferences: [],
    warnings: [],
  };

  store.forEachInOrder(course => {
    for (const prerequisite of course.prerequisites) {
      result.prerequisiteLinks++;

      if (prerequisite === course.courseNumber) {
        result.selfReferences.push(course.courseNumber);
        result.warnings.push(`${course.courseNumber} lists itself as a prerequisite`);
      } else if (!store.find(prerequisite)) {
        result.dangling.push({ courseNumber: course.courseNumber, prerequisite });
        result.warnings.push(`${course.courseNumber} requires ${prerequisite}, which is not in the data`);
      }
    }
  });

  result.passed = result.dangling.length === 0 && result.selfReferences.length === 0;
  return result;
}

/**
 * Log check results as a summary table, followed by any warnings
 */
export function logCheckResult(result: CatalogCheckResult): void {
  logger.summary('Catalog Check', {
    'Courses': result.courseCount,
    'Prerequisite links': result.prerequisiteLinks,
    'Dangling references': result.dangling.length,
    'Self references': result.selfReferences.length,
    'Status': result.passed ? 'PASSED' : 'WARNINGS',
  });

  for (const warning of result.warnings) {
    logger.warn('SanityCheck', warning);
  }
}
