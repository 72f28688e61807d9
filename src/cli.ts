/**
 * Course Planner command line
 * Parses arguments, preloads a data file and either prints a one-shot report
 * or starts the interactive menu.
 */

import { Command, CommanderError } from 'commander';
import { loadConfig } from './config.js';
import { logger, LogLevel } from './logger.js';
import { checkCatalog, logCheckResult } from './sanityChecks.js';
import { CoursePlannerSession, createTerminalIO, runShell } from './shell.js';
import type { ShellIO } from './shell.js';

type CliOptions = {
  file?: string;
  list?: boolean;
  course?: string;
  check?: boolean;
  verbose?: boolean;
};

function buildProgram(): Command {
  const program = new Command();

  program
    .name('course-planner')
    .description('Browse a course catalog and its prerequisites')
    .version('1.0.0')
    .exitOverride();

  program
    .option('-f, --file <path>', 'Course data file to load on startup')
    .option('-l, --list', 'Print all courses and exit')
    .option('-c, --course <number>', 'Print one course with its prerequisites and exit')
    .option('--check', 'Report prerequisites missing from the data after loading')
    .option('-v, --verbose', 'Verbose output');

  return program;
}

/**
 * Run the planner with user arguments (process.argv without node and script).
 * Resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  openIO: () => ShellIO & { close(): void } = createTerminalIO
): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    // --help and --version land here too, with exit code 0
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const options = program.opts<CliOptions>();
  const settings = loadConfig(env);
  logger.setLevel(options.verbose || settings.debug ? LogLevel.DEBUG : LogLevel.INFO);
  if (settings.logDir) {
    logger.startSession(settings.logDir);
  }

  try {
    return await run(options, settings.dataFile, openIO);
  } finally {
    logger.flush();
  }
}

async function run(
  options: CliOptions,
  configuredFile: string | undefined,
  openIO: () => ShellIO & { close(): void }
): Promise<number> {
  const session = new CoursePlannerSession();
  const dataFile = options.file ?? configuredFile;
  const oneShot = Boolean(options.list || options.course);

  if (oneShot && !dataFile) {
    logger.error('CLI', 'No data file given. Use --file or set COURSE_DATA_FILE in .env');
    return 1;
  }

  if (dataFile) {
    const { result, lines } = session.load(dataFile);
    lines.forEach(line => console.log(line));
    if (!result.ok) {
      if (oneShot) return 1;
    } else if (options.check) {
      logCheckResult(checkCatalog(session.store));
    }
  }

  if (oneShot) {
    if (options.list) {
      session.list().forEach(line => console.log(line));
    }
    if (options.course) {
      session.describe(options.course).forEach(line => console.log(line));
    }
    return 0;
  }

  const io = openIO();
  try {
    await runShell(io, session);
  } finally {
    io.close();
  }
  return 0;
}
