import { z } from "zod";

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    HOST: z.string().default("0.0.0.0"),
    APP_NAME: z.string().min(1).default("research"),
    LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
    LLM_MODEL: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    /** Unset keeps sessions and records in memory */
    DATA_DIR: z.string().min(1).optional(),
    MAX_STEPS: z.coerce.number().int().min(1).default(10),
    GRANTS_API_URL: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    const keyName = env.LLM_PROVIDER === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
    if (!env[keyName]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [keyName], message: `Required for LLM_PROVIDER=${env.LLM_PROVIDER}` });
    }
  });

export interface ServerConfig {
  port: number;
  host: string;
  appName: string;
  llm: { provider: "openai" | "anthropic"; model: string; apiKey: string };
  dataDir?: string;
  maxSteps: number;
  grantsApiUrl?: string;
}

const DEFAULT_MODELS = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
} as const;

/** Reads the server configuration from environment variables. Throws listing every invalid variable. */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const e = parsed.data;
  const apiKey = e.LLM_PROVIDER === "anthropic" ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY;
  return {
    port: e.PORT,
    host: e.HOST,
    appName: e.APP_NAME,
    llm: { provider: e.LLM_PROVIDER, model: e.LLM_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER], apiKey: apiKey ?? "" },
    dataDir: e.DATA_DIR,
    maxSteps: e.MAX_STEPS,
    grantsApiUrl: e.GRANTS_API_URL,
  };
}
