import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";

/**
 * Runtime configuration, read once from the environment (and `.env`).
 *
 * Every matching threshold is empirical, so each one can be overridden
 * without a code change. Defaults follow the values the metrics were
 * validated with.
 */

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const number = (fallback: number) => z.coerce.number().finite().default(fallback);
const positive = (fallback: number) => z.coerce.number().finite().positive().default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .catch("info"),

  // Matcher
  MATCH_EARLY_WINDOW_MINUTES: positive(5),
  MATCH_LATE_WINDOW_MINUTES: positive(15),
  MATCH_MAX_DISTANCE_METERS: positive(500),
  MATCH_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.3),

  // OTP
  OTP_EARLY_SECONDS: number(-60),
  OTP_LATE_SECONDS: number(300),
  OTP_FAST_PATH_STOP_METERS: positive(50),
  OTP_MATCHED_STOP_METERS: positive(200),

  // Headways
  HEADWAY_PROXIMITY_METERS: positive(50),
  HEADWAY_MAX_MINUTES: positive(120),

  // Speed
  SPEED_MIN_TRIP_MINUTES: positive(5),
  SPEED_MAX_MPH: positive(60),

  // Daily job
  DAILY_MIN_POSITIONS: z.coerce.number().int().nonnegative().default(50),
  DAILY_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),
  DAILY_RUN_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(3),
  SUMMARY_WINDOW_DAYS: z.coerce.number().int().positive().default(7),
});

export interface MatcherConfig {
  earlyWindowMinutes: number;
  lateWindowMinutes: number;
  maxDistanceMeters: number;
  minConfidence: number;
}

export interface AppConfig {
  databaseUrl: string | undefined;
  logLevel: LogLevel;
  matcher: MatcherConfig;
  otp: {
    earlyThresholdSeconds: number;
    lateThresholdSeconds: number;
    fastPathStopMeters: number;
    matchedStopMeters: number;
  };
  headways: {
    proximityMeters: number;
    maxHeadwayMinutes: number;
  };
  speed: {
    minTripMinutes: number;
    maxSpeedMph: number;
  };
  daily: {
    minPositions: number;
    lookbackDays: number;
    runHourUtc: number;
    /** Days averaged into the rolling route summaries. */
    summaryDays: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  if (e.OTP_EARLY_SECONDS > e.OTP_LATE_SECONDS) {
    throw new ConfigError("OTP_EARLY_SECONDS must not exceed OTP_LATE_SECONDS");
  }

  return {
    databaseUrl: e.DATABASE_URL,
    logLevel: e.LOG_LEVEL,
    matcher: {
      earlyWindowMinutes: e.MATCH_EARLY_WINDOW_MINUTES,
      lateWindowMinutes: e.MATCH_LATE_WINDOW_MINUTES,
      maxDistanceMeters: e.MATCH_MAX_DISTANCE_METERS,
      minConfidence: e.MATCH_MIN_CONFIDENCE,
    },
    otp: {
      earlyThresholdSeconds: e.OTP_EARLY_SECONDS,
      lateThresholdSeconds: e.OTP_LATE_SECONDS,
      fastPathStopMeters: e.OTP_FAST_PATH_STOP_METERS,
      matchedStopMeters: e.OTP_MATCHED_STOP_METERS,
    },
    headways: {
      proximityMeters: e.HEADWAY_PROXIMITY_METERS,
      maxHeadwayMinutes: e.HEADWAY_MAX_MINUTES,
    },
    speed: {
      minTripMinutes: e.SPEED_MIN_TRIP_MINUTES,
      maxSpeedMph: e.SPEED_MAX_MPH,
    },
    daily: {
      minPositions: e.DAILY_MIN_POSITIONS,
      lookbackDays: e.DAILY_LOOKBACK_DAYS,
      runHourUtc: e.DAILY_RUN_HOUR_UTC,
      summaryDays: e.SUMMARY_WINDOW_DAYS,
    },
  };
}

export const config: AppConfig = loadConfig();
