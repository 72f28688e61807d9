import { afterEach, describe, expect, test, vi } from "vitest";

import { loadCourses } from "../src/loader.js";
import { logger } from "../src/logger.js";
import { checkCatalog, logCheckResult } from "../src/sanityChecks.js";
import { CourseTree } from "../src/store/courseTree.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function storeOf(lines: string[]): CourseTree {
  const store = new CourseTree();
  loadCourses(lines.join("\n"), store);
  return store;
}

describe("sanityChecks.checkCatalog", () => {
  test("passes a fully resolved catalog", () => {
    const result = checkCatalog(storeOf(["CS100,Basics", "CS200,Data Structures,CS100"]));

    expect(result).toEqual({
      passed: true,
      courseCount: 2,
      prerequisiteLinks: 1,
      dangling: [],
      selfReferences: [],
      warnings: [],
    });
  });

  test("reports dangling and self references", () => {
    const result = checkCatalog(storeOf([
      "CS300,Operating Systems,CS200,CS250",
      "CS200,Data Structures,CS200",
      "CS250,Architecture",
    ]));

    expect(result.passed).toBe(false);
    expect(result.prerequisiteLinks).toBe(3);
    expect(result.dangling).toEqual([]);
    expect(result.selfReferences).toEqual(["CS200"]);
    expect(result.warnings).toEqual(["CS200 lists itself as a prerequisite"]);
  });

  test("collects prerequisites missing from the data in course order", () => {
    const result = checkCatalog(storeOf(["CS300,OS,CS999", "CS100,Basics,MATH050"]));

    expect(result.dangling).toEqual([
      { courseNumber: "CS100", prerequisite: "MATH050" },
      { courseNumber: "CS300", prerequisite: "CS999" },
    ]);
    expect(result.warnings).toEqual([
      "CS100 requires MATH050, which is not in the data",
      "CS300 requires CS999, which is not in the data",
    ]);
  });
});

describe("sanityChecks.logCheckResult", () => {
  test("writes a summary table and one warning per problem", () => {
    const summary = vi.spyOn(logger, "summary").mockImplementation(() => undefined);
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);

    logCheckResult(checkCatalog(storeOf(["CS300,OS,CS999"])));

    expect(summary).toHaveBeenCalledWith("Catalog Check", {
      "Courses": 1,
      "Prerequisite links": 1,
      "Dangling references": 1,
      "Self references": 0,
      "Status": "WARNINGS",
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("SanityCheck", "CS300 requires CS999, which is not in the data");
  });
});
