import { ConfigError } from "@/lib/errors";

export interface WorkerArgs {
  /** Run the daily job once and exit instead of starting the scheduler. */
  once: boolean;
  days: string | null;
  date: string | null;
  routeId: string | null;
}

/** Parses `--once`, `--days=N`, `--date=YYYY-MM-DD` and `--route=ID`. */
export const parseWorkerArgs = (argv: readonly string[]): WorkerArgs => {
  const args: WorkerArgs = { once: false, days: null, date: null, routeId: null };

  for (const arg of argv) {
    if (!arg.startsWith("--")) {
      throw new ConfigError(`Unexpected argument "${arg}"`);
    }
    const [key, rawValue] = arg.slice(2).split("=");
    const value = rawValue?.trim() ?? "";

    switch (key) {
      case "once":
        args.once = true;
        break;
      case "days":
        args.days = value;
        break;
      case "date":
        args.date = value;
        break;
      case "route":
        if (!value) throw new ConfigError("--route needs a route id");
        args.routeId = value;
        break;
      default:
        throw new ConfigError(`Unknown option "--${key ?? ""}"`);
    }
  }
  return args;
};
