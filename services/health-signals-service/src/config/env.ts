import fs from "fs";
import { z } from "zod";
import healthKeywords from "../data/healthKeywords.json";
import { ComplaintCategory } from "../interfaces/complaint";
import {
  COMPLAINT_CATEGORIES,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  OPEN_DATA_URL,
} from "../constants/openData";

const commaList = z
  .string()
  .transform((value) => value.split(",").map((part) => part.trim()).filter(Boolean));

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  SINK: z.enum(["kafka", "file"]).default("kafka"),
  KAFKA_BROKER_ADDRESS: z.string().min(1).optional(),
  OUTPUT_DIR: z.string().min(1).default("./output"),

  OPEN_DATA_BASE_URL: z.string().url().default(OPEN_DATA_URL),
  SOCRATA_APP_TOKEN: z.string().min(1).optional(),
  OPEN_DATA_PAGE_SIZE: z.coerce.number().int().positive().max(50_000).default(DEFAULT_PAGE_SIZE),
  OPEN_DATA_MAX_PAGES: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
  OPEN_DATA_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),
  COMPLAINT_CATEGORIES: commaList.pipe(z.array(z.enum(COMPLAINT_CATEGORIES)).min(1)).optional(),

  FEED_KEYWORDS: commaList.pipe(z.array(z.string()).min(1)).optional(),
  PRESS_RELEASE_LOOKBACK_DAYS: z.coerce.number().int().positive().default(30),
  RESPIRATORY_LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  INGEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
});

export type Env = z.infer<typeof envSchema>;

export type SinkConfig =
  | { type: "kafka"; broker: string }
  | { type: "file"; outputDir: string };

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  sink: SinkConfig;
  http: {
    timeoutMs: number;
  };
  feeds: {
    keywords: string[];
  };
  openData: {
    baseUrl: string;
    appToken?: string;
    pageSize: number;
    maxPages: number;
    lookbackDays: number;
    categories: ComplaintCategory[];
  };
  pressReleases: {
    lookbackDays: number;
  };
  respiratory: {
    lookbackDays: number;
  };
  scheduler: {
    intervalMs: number;
  };
}

/**
 * Accepts either a literal value or a Docker secrets path.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (value.startsWith("/run/secrets/")) {
    return fs.readFileSync(value, "utf8").trim();
  }
  return value;
}

/**
 * Load and validate configuration
 * @throws ZodError when a variable is malformed, Error when the sink is incomplete
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  let sink: SinkConfig;
  if (env.SINK === "kafka") {
    if (!env.KAFKA_BROKER_ADDRESS) {
      throw new Error("KAFKA_BROKER_ADDRESS is required when SINK=kafka");
    }
    sink = { type: "kafka", broker: env.KAFKA_BROKER_ADDRESS };
  } else {
    sink = { type: "file", outputDir: env.OUTPUT_DIR };
  }

  return {
    nodeEnv: env.NODE_ENV,
    sink,
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    feeds: {
      keywords: env.FEED_KEYWORDS ?? healthKeywords,
    },
    openData: {
      baseUrl: env.OPEN_DATA_BASE_URL,
      appToken: resolveSecret(env.SOCRATA_APP_TOKEN),
      pageSize: env.OPEN_DATA_PAGE_SIZE,
      maxPages: env.OPEN_DATA_MAX_PAGES,
      lookbackDays: env.OPEN_DATA_LOOKBACK_DAYS,
      categories: env.COMPLAINT_CATEGORIES ?? [...COMPLAINT_CATEGORIES],
    },
    pressReleases: {
      lookbackDays: env.PRESS_RELEASE_LOOKBACK_DAYS,
    },
    respiratory: {
      lookbackDays: env.RESPIRATORY_LOOKBACK_DAYS,
    },
    scheduler: {
      intervalMs: env.INGEST_INTERVAL_MS,
    },
  };
}
