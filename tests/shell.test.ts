import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PassThrough, Writable } from "stream";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { CoursePlannerSession, MENU_LINES, MESSAGES, createTerminalIO, runShell, type ShellIO } from "../src/shell.js";

let tmpDir: string;
let dataFile: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "course-planner-shell-"));
  dataFile = path.join(tmpDir, "courses.csv");
  fs.writeFileSync(dataFile, ["CS200,Data Structures,CS100", "CS100,Programming Basics", "CS101"].join("\n"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

/** Removes every full menu block from the printed lines */
function withoutMenus(lines: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < lines.length; ) {
    const block = lines.slice(i, i + MENU_LINES.length);
    if (block.length === MENU_LINES.length && block.every((line, j) => line === MENU_LINES[j])) {
      i += MENU_LINES.length;
    } else {
      out.push(lines[i]);
      i++;
    }
  }
  return out;
}

/** Scripted input; records prompts and printed lines */
function scriptedIO(answers: string[]): ShellIO & { printed: string[]; prompts: string[]; readonly output: string[] } {
  const queue = [...answers];
  const printed: string[] = [];
  const prompts: string[] = [];

  return {
    printed,
    prompts,
    get output() {
      return withoutMenus(printed);
    },
    async ask(question: string) {
      prompts.push(question);
      return queue.shift() ?? null;
    },
    print(line: string) {
      printed.push(line);
    },
  };
}

describe("shell.runShell", () => {
  test("asks to load before listing or describing", async () => {
    const io = scriptedIO(["2", "3", "9"]);
    await runShell(io);

    expect(io.printed.slice(0, MENU_LINES.length)).toEqual(MENU_LINES);
    expect(io.output).toEqual([MESSAGES.loadFirst, MESSAGES.loadFirst, MESSAGES.goodbye]);
  });

  test("loads, lists and describes", async () => {
    const io = scriptedIO(["1", dataFile, "2", "3", "cs200", "9"]);
    await runShell(io);

    expect(io.output).toEqual([
      "File format error on line 3: fewer than two fields. Offending line: CS101",
      `Courses successfully loaded from file: ${dataFile}`,
      "",
      "Here is the list of courses:",
      "CS100, Programming Basics",
      "CS200, Data Structures",
      "",
      "CS200, Data Structures",
      "Prerequisites:",
      "  CS100, Programming Basics",
      MESSAGES.goodbye,
    ]);
    expect(io.prompts).toEqual([
      MESSAGES.choicePrompt,
      MESSAGES.fileNamePrompt,
      MESSAGES.choicePrompt,
      MESSAGES.choicePrompt,
      MESSAGES.courseNumberPrompt,
      MESSAGES.choicePrompt,
    ]);
  });

  test("reports invalid choices and empty answers", async () => {
    const io = scriptedIO(["4", "1", "  ", "1", dataFile, "3", "", "9"]);
    await runShell(io);

    expect(io.output).toEqual([
      MESSAGES.invalidChoice,
      MESSAGES.emptyFileName,
      "File format error on line 3: fewer than two fields. Offending line: CS101",
      `Courses successfully loaded from file: ${dataFile}`,
      MESSAGES.emptyCourseNumber,
      MESSAGES.goodbye,
    ]);
  });

  test("reports an unknown course", async () => {
    const io = scriptedIO(["1", dataFile, "3", "math999", "9"]);
    await runShell(io);

    expect(io.output.slice(-3)).toEqual(["", "Course MATH999 not found.", MESSAGES.goodbye]);
  });

  test("a failed reload leaves nothing to list", async () => {
    const missing = path.join(tmpDir, "missing.csv");
    const io = scriptedIO(["1", dataFile, "1", missing, "2", "9"]);
    await runShell(io);

    expect(io.output.slice(2)).toEqual([
      `Error opening file: ${missing}`,
      "",
      "Here is the list of courses:",
      "No courses loaded.",
      MESSAGES.goodbye,
    ]);
  });

  test("stops quietly when input ends", async () => {
    const io = scriptedIO(["2"]);
    await runShell(io);

    expect(io.output).toEqual([MESSAGES.loadFirst]);
    expect(io.prompts).toEqual([MESSAGES.choicePrompt, MESSAGES.choicePrompt]);
  });
});

describe("shell.CoursePlannerSession", () => {
  test("tracks whether a load has succeeded", () => {
    const session = new CoursePlannerSession();
    expect(session.loaded).toBe(false);

    const failed = session.load(path.join(tmpDir, "missing.csv"));
    expect(failed.result.ok).toBe(false);
    expect(session.loaded).toBe(false);

    session.load(dataFile);
    expect(session.loaded).toBe(true);
    expect(session.store.size).toBe(2);
    expect(session.describe("CS100")).toEqual(["CS100, Programming Basics", "Prerequisites: None"]);
  });
});

describe("shell.createTerminalIO", () => {
  test("writes prompts and reads lines until the stream ends", async () => {
    const input = new PassThrough();
    const written: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        written.push(String(chunk));
        callback();
      },
    });

    const io = createTerminalIO(input, output);
    input.end("9\n");

    const first = await io.ask("choice? ");
    const second = await io.ask("again? ");
    io.print("bye");
    io.close();

    expect(first).toBe("9");
    expect(second).toBeNull();
    expect(written.join("")).toBe("choice? again? bye\n");
  });
});
