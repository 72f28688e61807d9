/**
 * Environment-driven settings. Call dotenv's config() before loadConfig()
 * so values from .env are visible.
 */

import type { PlannerConfig } from './types.js';

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  return {
    dataFile: optional(env.COURSE_DATA_FILE),
    debug: env.DEBUG_PLANNER === 'true',
    logDir: optional(env.PLANNER_LOG_DIR),
  };
}
