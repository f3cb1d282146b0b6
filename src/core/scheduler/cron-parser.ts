/**
 * Cron expression helpers on top of cron-parser
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 3 * * *"      - Every day at 3:00 AM
 *   "30 1 * * 0"     - Every Sunday at 1:30 AM
 *   "0 0,12 * * *"   - At midnight and noon
 */

import { CronExpressionParser } from "cron-parser";
import { ConfigError } from "../../errors";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

function parserOptions(cron: ParsedCron, currentDate?: Date): { currentDate?: Date; tz?: string } {
  const options: { currentDate?: Date; tz?: string } = {};
  if (currentDate) options.currentDate = currentDate;
  if (cron.timezone) options.tz = cron.timezone;
  return options;
}

/**
 * Validate a five-field cron expression
 */
export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new ConfigError(`Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`);
  }

  const cron: ParsedCron = { expression: expression.trim(), timezone };
  try {
    CronExpressionParser.parse(cron.expression, parserOptions(cron));
  } catch (err) {
    throw new ConfigError(`Invalid cron expression "${expression}": ${err instanceof Error ? err.message : String(err)}`);
  }
  return cron;
}

/**
 * Does the cron fire in the minute containing `date`
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = new Date(date);
  minute.setSeconds(0, 0);

  // First occurrence after the previous minute
  const from = new Date(minute.getTime() - 60_000);
  const next = CronExpressionParser.parse(cron.expression, parserOptions(cron, from)).next().toDate();
  next.setSeconds(0, 0);

  return next.getTime() === minute.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  return CronExpressionParser.parse(cron.expression, parserOptions(cron, fromDate)).next().toDate();
}
