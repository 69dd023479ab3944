import cron from "node-cron";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { RunSummary } from "./types.js";

export type RunOnce = () => Promise<RunSummary>;
export type Scheduler = (expression: string, task: () => Promise<void>) => void;

const cronScheduler: Scheduler = (expression, task) => {
  cron.schedule(expression, task);
};

/** One-shot runs fail when the cursor file could not be written. */
export function exitCodeFor(summary: RunSummary): number {
  return summary.stateSaved ? 0 : 1;
}

// A tick that fires while the previous run is still going is dropped
export function createTick(run: RunOnce): () => Promise<void> {
  let running = false;
  return async () => {
    if (running) {
      console.warn("[BOT] Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    console.log(`[BOT] Run started at ${new Date().toISOString()}`);
    try {
      await run();
    } catch (err) {
      console.error("[BOT] Run error:", errorMessage(err));
    } finally {
      running = false;
    }
  };
}

export function startSchedule(expression: string, run: RunOnce, scheduler: Scheduler = cronScheduler): Promise<void> {
  if (!cron.validate(expression)) {
    throw new ConfigurationError(`Invalid MONITOR_CRON expression: ${expression}`);
  }

  const tick = createTick(run);
  scheduler(expression, tick);
  console.log(`[BOT] Scheduled with "${expression}"`);
  // Run immediately at startup
  return tick();
}
