import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { runNewsletterCycle } from "./newsletter/orchestrator";
import type { NewsletterDeps } from "./newsletter/orchestrator";

export type Scheduler = {
  readonly stop: () => void;
};

/**
 * Creates and starts a scheduler that runs one newsletter cycle per tick of
 * the given cron expression.
 *
 * @param expression - Cron expression, usually `schedule.cron` from the config
 * @param deps - Dependencies passed to each cycle
 * @returns A Scheduler with a stop() method to halt the scheduled runs
 */
export function createNewsletterScheduler(
  expression: string,
  deps: NewsletterDeps,
): Scheduler {
  const task: ScheduledTask = cron.schedule(expression, async () => {
    try {
      const result = await runNewsletterCycle(deps);
      if (!result.success) {
        deps.logger.warn(
          { stage: result.stage },
          "scheduled newsletter run produced no newsletter",
        );
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "newsletter cycle failed unexpectedly");
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
