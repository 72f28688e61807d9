/**
 * CourseTree - ordered store of courses keyed by course number
 *
 * An unbalanced binary search tree. Nodes live in an arena array and refer to
 * their children by index; insert, find and traversal are iterative, so a
 * sorted input file (a degenerate chain) cannot overflow the call stack.
 *
 * | Operation      | Average  | Worst |
 * | -------------- | -------- | ----- |
 * | insertOrUpdate | O(log n) | O(n)  |
 * | find           | O(log n) | O(n)  |
 * | forEachInOrder | O(n)     | O(n)  |
 *
 * Keys are normalized with normalizeCourseNumber() on the way in and on every
 * lookup, so stored keys are always uppercase. Courses go in and come out as
 * copies; callers never hold a reference to a stored record.
 */

import { normalizeCourseNumber } from '../parsers/courseLineParser.js';
import type { Course } from '../types.js';

const NONE = -1;

interface TreeNode {
  course: Course;
  lower: number;
  higher: number;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function copyCourse(course: Course, courseNumber: string): Course {
  return {
    courseNumber,
    courseTitle: course.courseTitle,
    prerequisites: [...course.prerequisites],
  };
}

export class CourseTree implements Iterable<Course> {
  private nodes: TreeNode[] = [];
  private root = NONE;

  get size(): number {
    return this.nodes.length;
  }

  isEmpty(): boolean {
    return this.root === NONE;
  }

  /**
   * Insert a course, or overwrite title and prerequisites of the course
   * already stored under the same number.
   */
  insertOrUpdate(course: Course): void {
    const key = normalizeCourseNumber(course.courseNumber);

    if (this.root === NONE) {
      this.root = this.allocate(copyCourse(course, key));
      return;
    }

    let current = this.root;
    for (;;) {
      const node = this.nodes[current];
      const order = compareKeys(key, node.course.courseNumber);

      if (order === 0) {
        node.course.courseTitle = course.courseTitle;
        node.course.prerequisites = [...course.prerequisites];
        return;
      }

      const next = order < 0 ? node.lower : node.higher;
      if (next === NONE) {
        const index = this.allocate(copyCourse(course, key));
        if (order < 0) {
          node.lower = index;
        } else {
          node.higher = index;
        }
        return;
      }
      current = next;
    }
  }

  find(courseNumber: string): Course | undefined {
    const key = normalizeCourseNumber(courseNumber);
    let current = this.root;

    while (current !== NONE) {
      const node = this.nodes[current];
      const order = compareKeys(key, node.course.courseNumber);
      if (order === 0) return copyCourse(node.course, node.course.courseNumber);
      current = order < 0 ? node.lower : node.higher;
    }

    return undefined;
  }

  /**
   * Visit every course in ascending course-number order.
   */
  forEachInOrder(visit: (course: Course) => void): void {
    for (const course of this) {
      visit(course);
    }
  }

  *[Symbol.iterator](): Iterator<Course> {
    const stack: number[] = [];
    let current = this.root;

    while (current !== NONE || stack.length > 0) {
      while (current !== NONE) {
        stack.push(current);
        current = this.nodes[current].lower;
      }
      const index = stack.pop();
      if (index === undefined) break;
      const node = this.nodes[index];
      yield copyCourse(node.course, node.course.courseNumber);
      current = node.higher;
    }
  }

  /**
   * Number of nodes on the longest root-to-leaf path (0 when empty).
   */
  height(): number {
    if (this.root === NONE) return 0;

    let deepest = 0;
    const pending: Array<[index: number, depth: number]> = [[this.root, 1]];
    for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
      const [index, depth] = item;
      const node = this.nodes[index];
      deepest = Math.max(deepest, depth);
      if (node.lower !== NONE) pending.push([node.lower, depth + 1]);
      if (node.higher !== NONE) pending.push([node.higher, depth + 1]);
    }
    return deepest;
  }

  /**
   * Drop every course. The arena is replaced wholesale, so no node survives
   * and none is released twice.
   */
  clear(): void {
    this.nodes = [];
    this.root = NONE;
  }

  private allocate(course: Course): number {
    this.nodes.push({ course, lower: NONE, higher: NONE });
    return this.nodes.length - 1;
  }
}
