/**
 * Configuration
 *
 * Reads and validates settings from environment variables. Entry points
 * call `dotenv.config()` before `loadConfig()`.
 */

import { z } from "zod";
import { DEFAULT_CACHE_DIR } from "./docs/archive-fetcher";
import { DEFAULT_HOST } from "./docs/types";
import { DEFAULT_READER_URL } from "./tools/web-page";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  GITHUB_HOST: z.string().url().default(DEFAULT_HOST),
  DOCS_CACHE_DIR: z.string().min(1).default(DEFAULT_CACHE_DIR),
  PAGE_READER_URL: z.string().url().default(DEFAULT_READER_URL),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  llm: {
    provider: Env["LLM_PROVIDER"];
    openaiApiKey?: string;
    openaiBaseUrl: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
  };
  docs: {
    host: string;
    cacheDir: string;
  };
  page: {
    readerUrl: string;
  };
  agent: {
    maxIterations: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const values = parsed.data;
  return {
    llm: {
      provider: values.LLM_PROVIDER,
      openaiApiKey: values.OPENAI_API_KEY,
      openaiBaseUrl: values.OPENAI_BASE_URL,
      openaiModel: values.OPENAI_MODEL,
      anthropicApiKey: values.ANTHROPIC_API_KEY,
      anthropicModel: values.ANTHROPIC_MODEL,
    },
    docs: {
      host: values.GITHUB_HOST,
      cacheDir: values.DOCS_CACHE_DIR,
    },
    page: {
      readerUrl: values.PAGE_READER_URL,
    },
    agent: {
      maxIterations: values.AGENT_MAX_ITERATIONS,
    },
  };
}
