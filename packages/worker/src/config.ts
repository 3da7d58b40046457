import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const trailerSources = ["browser", "api", "auto"] as const;
export type TrailerSource = (typeof trailerSources)[number];

const configSchema = z.object({
  CONCURRENCY: z.coerce.number().int().positive().default(10),
  CHUNK_SIZE: z.coerce.number().int().positive().default(100),
  OUTPUT_PREFIX: z.string().min(1).default("rando_bin"),
  OUTPUT_DIR: z.string().min(1).default("."),
  APPIDS_FILE: z.string().min(1).default("steam_appids.txt"),
  MPD_WAIT_MS: z.coerce.number().int().nonnegative().default(15_000),
  // a little headroom under Steam's ~200 requests per 5 minutes
  STEAM_API_MAX_CALLS: z.coerce.number().int().positive().default(195),
  STEAM_API_PERIOD_MS: z.coerce.number().positive().default(300_000),
  STEAM_API_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  JITTER_MAX_MS: z.coerce.number().int().nonnegative().default(2_000),
  TRAILER_SOURCE: z.enum(trailerSources).default("browser"),
  // empty means "not set", as written in .env.example
  CHROMIUM_EXECUTABLE_PATH: z
    .string()
    .optional()
    .transform((value) => value || undefined),
});

export interface RunConfig {
  concurrency: number;
  chunkSize: number;
  outputPrefix: string;
  outputDir: string;
  appidsFile: string;
  mpdWaitMs: number;
  apiMaxCalls: number;
  apiPeriodMs: number;
  apiMaxRetries: number;
  jitterMaxMs: number;
  trailerSource: TrailerSource;
  chromiumExecutablePath?: string;
}

/** Reads run settings from the environment, failing with every bad variable listed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const c = parsed.data;
  return {
    concurrency: c.CONCURRENCY,
    chunkSize: c.CHUNK_SIZE,
    outputPrefix: c.OUTPUT_PREFIX,
    outputDir: c.OUTPUT_DIR,
    appidsFile: c.APPIDS_FILE,
    mpdWaitMs: c.MPD_WAIT_MS,
    apiMaxCalls: c.STEAM_API_MAX_CALLS,
    apiPeriodMs: c.STEAM_API_PERIOD_MS,
    apiMaxRetries: c.STEAM_API_MAX_RETRIES,
    jitterMaxMs: c.JITTER_MAX_MS,
    trailerSource: c.TRAILER_SOURCE,
    chromiumExecutablePath: c.CHROMIUM_EXECUTABLE_PATH,
  };
}
