/**
 * Interactive Shell
 * Numbered menu over a CoursePlannerSession. Terminal access goes through
 * ShellIO so the loop can be driven by scripted input.
 */

import * as readline from 'readline';
import { formatDiagnostic, loadCourseFile } from './loader.js';
import { logger } from './logger.js';
import { describe, listCourses } from './reporter.js';
import { CourseTree } from './store/courseTree.js';
import type { LoadResult } from './types.js';

export interface ShellIO {
  /** Resolves to null once input is exhausted */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}

export const MENU_LINES = [
  '',
  '*******************************',
  'Welcome to the course planner',
  '*******************************',
  '1. Load Data Structure',
  '2. Print Course List',
  '3. Print Course',
  '9. Exit',
];

export const MESSAGES = {
  choicePrompt: 'Please enter your choice: ',
  fileNamePrompt: 'Enter course data file name: ',
  courseNumberPrompt: 'Please enter the course number (for example, CS200): ',
  emptyFileName: 'File name cannot be empty.',
  emptyCourseNumber: 'Course number cannot be empty.',
  loadFirst: 'Please load the data structure first (option 1).',
  invalidChoice: 'Invalid choice. Please enter 1, 2, 3, or 9.',
  listHeader: 'Here is the list of courses:',
  goodbye: 'Thank you for using the course planner. Goodbye!',
} as const;

/**
 * Planner state shared by the menu and the one-shot CLI modes
 */
export class CoursePlannerSession {
  readonly store: CourseTree;
  private hasLoaded = false;

  constructor(store: CourseTree = new CourseTree()) {
    this.store = store;
  }

  /** True once any load has succeeded */
  get loaded(): boolean {
    return this.hasLoaded;
  }

  load(filePath: string): { result: LoadResult; lines: string[] } {
    const result = loadCourseFile(filePath, this.store);

    if (!result.ok) {
      return { result, lines: [`Error opening file: ${filePath}`] };
    }

    this.hasLoaded = true;
    const lines = result.summary.diagnostics.map(formatDiagnostic);
    lines.push(`Courses successfully loaded from file: ${filePath}`);
    logger.debug('Shell', `Loaded ${result.summary.coursesLoaded} courses`, { source: filePath });
    return { result, lines };
  }

  list(): string[] {
    return listCourses(this.store);
  }

  describe(courseNumber: string): string[] {
    return describe(courseNumber, this.store).split('\n');
  }
}

/**
 * Run the menu loop until the user exits or input ends
 */
export async function runShell(io: ShellIO, session: CoursePlannerSession = new CoursePlannerSession()): Promise<void> {
  const printAll = (lines: string[]) => lines.forEach(line => io.print(line));

  for (;;) {
    printAll(MENU_LINES);
    const answer = await io.ask(MESSAGES.choicePrompt);
    if (answer === null) return;

    const choice = answer.trim();

    switch (choice) {
      case '1': {
        const fileName = await io.ask(MESSAGES.fileNamePrompt);
        if (fileName === null) return;
        if (fileName.trim() === '') {
          io.print(MESSAGES.emptyFileName);
          break;
        }
        printAll(session.load(fileName.trim()).lines);
        break;
      }

      case '2':
        if (!session.loaded) {
          io.print(MESSAGES.loadFirst);
          break;
        }
        io.print('');
        io.print(MESSAGES.listHeader);
        printAll(session.list());
        break;

      case '3': {
        if (!session.loaded) {
          io.print(MESSAGES.loadFirst);
          break;
        }
        const courseNumber = await io.ask(MESSAGES.courseNumberPrompt);
        if (courseNumber === null) return;
        if (courseNumber.trim() === '') {
          io.print(MESSAGES.emptyCourseNumber);
          break;
        }
        io.print('');
        printAll(session.describe(courseNumber));
        break;
      }

      case '9':
        io.print(MESSAGES.goodbye);
        return;

      default:
        io.print(MESSAGES.invalidChoice);
    }
  }
}

/**
 * ShellIO over stdin/stdout
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ShellIO & { close(): void } {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string) {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(line: string) {
      output.write(line + '\n');
    },
    close() {
      rl.close();
    },
  };
}
