/**
 * Scheduler: trigger definitions per target, cron evaluation and manual triggers
 */

import { resolveScheduleTarget } from "../../config/resolver";
import { describeError, JobAlreadyRunningError } from "../../errors";
import type { BackupJob, GuardConfig, JobOutcome, JobTarget } from "../../types";
import { createLogger } from "../../utils/logger";
import type { JobHandle, JobRunner } from "../jobs/job-runner";
import { targetKey } from "../jobs/lock-registry";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

const log = createLogger("scheduler");

const CHECK_INTERVAL_MS = 60 * 1000;

export interface TriggerDefinition {
  /** Display name, e.g. the config schedule key */
  name: string;
  target: JobTarget;
  cron: string;
  timezone?: string;
  enabled?: boolean;
}

export interface TriggerStatus {
  key: string;
  name: string;
  cron: string;
  enabled: boolean;
  lastRun: Date | null;
  nextRun: Date | null;
}

export interface JobStatusReport {
  target: string;
  running: BackupJob | null;
  lastOutcome: JobOutcome | null;
  trigger: TriggerStatus | null;
}

export interface SchedulerStatus {
  running: boolean;
  triggers: TriggerStatus[];
  activeJobs: BackupJob[];
}

interface TriggerState {
  definition: TriggerDefinition;
  cron: ParsedCron;
  lastRun: Date | null;
}

/**
 * Trigger definitions declared in config
 */
export function triggersFromConfig(config: GuardConfig): TriggerDefinition[] {
  return Object.entries(config.schedules).map(([name, schedule]) => ({
    name,
    target: resolveScheduleTarget(name, schedule),
    cron: schedule.cron,
    timezone: schedule.timezone,
    enabled: schedule.enabled ?? true,
  }));
}

export class Scheduler {
  private readonly triggers = new Map<string, TriggerState>();
  private readonly lastOutcomes = new Map<string, JobOutcome>();
  private readonly pending = new Set<Promise<void>>();
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly runner: JobRunner,
    private readonly options: { intervalMs?: number } = {},
  ) {}

  get running(): boolean {
    return this.checkInterval !== null;
  }

  /**
   * Add or replace the trigger for a target. Throws ConfigError on a bad cron.
   */
  setTrigger(definition: TriggerDefinition): void {
    const cron = parseCron(definition.cron, definition.timezone);
    const key = targetKey(definition.target);
    const previous = this.triggers.get(key);
    this.triggers.set(key, { definition, cron, lastRun: previous?.lastRun ?? null });
    log.debug(`Trigger "${definition.name}" for ${key}: ${definition.cron}`);
  }

  removeTrigger(target: JobTarget): boolean {
    return this.triggers.delete(targetKey(target));
  }

  listTriggers(now: Date = new Date()): TriggerStatus[] {
    return [...this.triggers.entries()].map(([key, state]) => this.describeTrigger(key, state, now));
  }

  /**
   * Run a job for `target` immediately. Throws JobAlreadyRunningError when busy.
   */
  triggerNow(target: JobTarget): JobHandle {
    return this.launch(target, "manual");
  }

  getJobStatus(target: JobTarget): JobStatusReport {
    const key = targetKey(target);
    const state = this.triggers.get(key);
    return {
      target: key,
      running: this.runner.getActiveJob(key),
      lastOutcome: this.lastOutcomes.get(key) ?? null,
      trigger: state ? this.describeTrigger(key, state, new Date()) : null,
    };
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      triggers: this.listTriggers(),
      activeJobs: this.runner.activeJobs(),
    };
  }

  start(): void {
    if (this.checkInterval) {
      log.warn("Scheduler is already running");
      return;
    }

    log.info(`Scheduler started with ${this.triggers.size} trigger(s)`);
    this.tick();
    this.checkInterval = setInterval(() => {
      this.tick();
    }, this.options.intervalMs ?? CHECK_INTERVAL_MS);
  }

  stop(): void {
    if (!this.checkInterval) {
      return;
    }
    clearInterval(this.checkInterval);
    this.checkInterval = null;
    log.info("Scheduler stopped");
  }

  /**
   * Wait for every job started by this scheduler to finish
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /**
   * Start the jobs due in the minute containing `now`; busy targets are skipped
   */
  tick(now: Date = new Date()): JobHandle[] {
    const minute = new Date(now);
    minute.setSeconds(0, 0);
    const started: JobHandle[] = [];

    for (const [key, state] of this.triggers) {
      if (state.definition.enabled === false) continue;
      if (!matchesCron(state.cron, minute)) continue;
      if (state.lastRun && state.lastRun.getTime() === minute.getTime()) continue;

      state.lastRun = minute;
      if (this.runner.isBusy(state.definition.target)) {
        log.warn(`Schedule "${state.definition.name}" skipped: a conflicting job for ${key} is running`);
        continue;
      }

      log.info(`Schedule "${state.definition.name}" triggered`);
      try {
        started.push(this.launch(state.definition.target, "schedule"));
      } catch (err) {
        if (err instanceof JobAlreadyRunningError) {
          log.warn(`Schedule "${state.definition.name}" skipped: ${err.message}`);
        } else {
          log.error(`Schedule "${state.definition.name}" failed to start: ${describeError(err).message}`);
        }
      }
    }

    return started;
  }

  private launch(target: JobTarget, trigger: "schedule" | "manual"): JobHandle {
    const handle = this.runner.start(target, trigger);
    const key = targetKey(target);
    const tracked: Promise<void> = handle.done
      .then((outcome) => {
        this.lastOutcomes.set(key, outcome);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
    return handle;
  }

  private describeTrigger(key: string, state: TriggerState, now: Date): TriggerStatus {
    const enabled = state.definition.enabled ?? true;
    return {
      key,
      name: state.definition.name,
      cron: state.definition.cron,
      enabled,
      lastRun: state.lastRun,
      nextRun: enabled ? getNextRun(state.cron, now) : null,
    };
  }
}
