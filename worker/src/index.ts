/**
 * Transit metrics worker
 *
 * A long-running process that computes route metrics from the positions the
 * collector stores:
 *   - daily-metrics at DAILY_RUN_HOUR_UTC (03:00 UTC by default): the last
 *     DAILY_LOOKBACK_DAYS days of per-route OTP, headway and speed, then the
 *     rolling summaries
 *
 * `--once` runs the job immediately and exits; `--days=N`, `--date=YYYY-MM-DD`
 * and `--route=ID` narrow that run.
 */

import { config } from "@/lib/config";
import { getStore } from "@/lib/db";
import { logger } from "@/lib/logger";
import { parseDateFilter } from "@/lib/analytics/date-filter";
import { parseWorkerArgs } from "./args.js";
import { runDailyMetrics } from "./cron-metrics.js";
import { createScheduler, sleep, type ScheduledJob } from "./scheduler.js";

const CHECK_INTERVAL_MS = 60_000;

async function main(): Promise<void> {
  const args = parseWorkerArgs(process.argv.slice(2));
  const store = getStore();

  const controller = new AbortController();
  const shutdown = () => {
    logger.log("Shutting down...");
    controller.abort();
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  if (args.once) {
    const filter = parseDateFilter(args.days, args.date, config.daily.lookbackDays);
    const report = await runDailyMetrics(store, {
      dates: filter.dates,
      routeId: args.routeId ?? undefined,
      signal: controller.signal,
    });
    if (report.aborted) process.exitCode = 1;
    return;
  }

  const jobs: ScheduledJob[] = [
    {
      name: "daily-metrics",
      hour: config.daily.runHourUtc,
      dayOfWeek: null,
      fn: async () => {
        await runDailyMetrics(store, { signal: controller.signal });
      },
    },
  ];
  const scheduler = createScheduler(jobs);

  logger.log("=== Transit Metrics Worker ===");
  logger.log("Scheduled jobs:");
  for (const job of jobs) {
    logger.log("  - " + job.name + ": " + String(job.hour).padStart(2, "0") + ":00 UTC (daily)");
  }
  logger.log("");

  while (!controller.signal.aborted) {
    const cycleStart = Date.now();
    await scheduler.checkScheduledJobs();
    const sleepMs = Math.max(0, CHECK_INTERVAL_MS - (Date.now() - cycleStart));
    if (sleepMs > 0) await sleep(sleepMs, controller.signal);
  }
}

main().catch((error) => {
  logger.error("FATAL:", error);
  process.exit(1);
});
