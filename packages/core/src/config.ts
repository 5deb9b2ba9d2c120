import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_TIMESTAMP_PATTERN, compileTimestampPattern } from "./ingestion/timestamps";

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  STAGE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  TIMESTAMP_PATTERN: z.string().optional(),
  OUTPUT_DIR: z.string().trim().min(1).default("outputs"),
});

export interface AppConfig {
  openaiApiKey: string | null;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  concurrency: number;
  timestampPattern: RegExp;
  outputDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const vars = parsed.data;

  let timestampPattern = DEFAULT_TIMESTAMP_PATTERN;
  if (vars.TIMESTAMP_PATTERN) {
    try {
      timestampPattern = compileTimestampPattern(vars.TIMESTAMP_PATTERN);
    } catch (err) {
      throw new ConfigError(`Invalid configuration: TIMESTAMP_PATTERN: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return {
    // an empty value, as in .env.example, means unset
    openaiApiKey: vars.OPENAI_API_KEY || null,
    model: vars.OPENAI_MODEL,
    timeoutMs: vars.OPENAI_TIMEOUT_MS,
    maxAttempts: vars.STAGE_MAX_ATTEMPTS,
    concurrency: vars.BATCH_CONCURRENCY,
    timestampPattern,
    outputDir: vars.OUTPUT_DIR,
  };
}

export function requireOpenAIKey(config: AppConfig): string {
  if (!config.openaiApiKey) throw new ConfigError("OPENAI_API_KEY not set");
  return config.openaiApiKey;
}
