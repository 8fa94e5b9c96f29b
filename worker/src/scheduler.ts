import { logger } from "@/lib/logger";

export interface ScheduledJob {
  name: string;
  /** UTC hour the job runs at. */
  hour: number;
  /** 0 = Sunday; null runs every day. */
  dayOfWeek: number | null;
  fn: () => Promise<void>;
}

/**
 * Runs each job at most once per UTC day, on the first check that falls in
 * its hour. A failing job is logged and retried the next day.
 */
export function createScheduler(jobs: readonly ScheduledJob[]) {
  const jobLastRun = new Map<string, string>();

  async function checkScheduledJobs(now: Date = new Date()): Promise<string[]> {
    const utcHour = now.getUTCHours();
    const utcDay = now.getUTCDay();
    const todayKey = now.toISOString().slice(0, 10);
    const ran: string[] = [];

    for (const job of jobs) {
      if (utcHour !== job.hour) continue;
      if (job.dayOfWeek !== null && utcDay !== job.dayOfWeek) continue;

      const runKey = todayKey + ":" + job.name;
      if (jobLastRun.get(job.name) === runKey) continue;

      jobLastRun.set(job.name, runKey);
      ran.push(job.name);

      logger.log("[scheduler] Starting " + job.name + "...");
      try {
        await job.fn();
        logger.log("[scheduler] " + job.name + " completed successfully");
      } catch (error) {
        logger.error("[scheduler] " + job.name + " failed:", error);
      }
    }
    return ran;
  }

  return { checkScheduledJobs };
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. The abort listener is
 * removed when the timer fires, so a long-lived signal does not collect one
 * listener per wait.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
