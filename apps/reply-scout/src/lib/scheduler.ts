import { ConfigValidationError } from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import cron from "node-cron";

export interface GuardedRun {
  /** Resolves to false when skipped because a previous run is in progress. */
  run(): Promise<boolean>;
  /** Resolves once the in-flight run, if any, has settled. */
  settled(): Promise<void>;
}

export interface ScheduledRuns {
  /** Stops the schedule and waits for the in-flight run. */
  stop(): Promise<void>;
}

/**
 * Wraps a task so that a call made while a previous one is still running is
 * skipped.
 */
export function createGuardedRun(
  task: () => Promise<unknown>,
  logger: AppLogger
): GuardedRun {
  let current: Promise<void> | null = null;

  const execute = async () => {
    try {
      await task();
    } catch (error) {
      logger.error("Scheduled run failed", { error });
    }
  };

  return {
    run: async () => {
      if (current) {
        logger.warn("⏭️ Previous run still in progress, skipping tick");
        return false;
      }
      current = execute();
      try {
        await current;
      } finally {
        current = null;
      }
      return true;
    },
    settled: async () => {
      await current;
    },
  };
}

export function scheduleRuns(
  expression: string,
  timezone: string,
  task: () => Promise<unknown>,
  logger: AppLogger
): ScheduledRuns {
  if (!cron.validate(expression)) {
    throw new ConfigValidationError(`invalid cron expression "${expression}"`);
  }

  const guarded = createGuardedRun(task, logger);
  logger.info(`⏰ Scheduled runs at "${expression}" (${timezone})`);

  const scheduled = cron.schedule(
    expression,
    async () => {
      await guarded.run();
    },
    { timezone }
  );

  return {
    stop: async () => {
      scheduled.stop();
      await guarded.settled();
    },
  };
}
