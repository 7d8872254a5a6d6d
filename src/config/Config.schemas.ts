import { z } from "zod";

// --- Schemas ---

export const ApiConfigSchema = z.object({
  /** Base URL of the graph API (default: 'https://api.getzep.com/api/v2') */
  baseUrl: z.string().url().optional(),
  /** Timeout of one HTTP request in ms (default: 30000) */
  requestTimeoutMs: z.number().int().positive().optional(),
});

export const RetryConfigSchema = z
  .object({
    /** Attempts per call, first one included (default and maximum: 3) */
    maxAttempts: z.number().int().positive().max(3).optional(),
    /** Delay before the first retry in ms, doubled on each retry (default: 500) */
    baseDelayMs: z.number().int().nonnegative().optional(),
    /** Upper bound of a retry delay in ms (default: 8000) */
    maxDelayMs: z.number().int().nonnegative().optional(),
  })
  .refine(
    (retry) =>
      retry.baseDelayMs === undefined ||
      retry.maxDelayMs === undefined ||
      retry.baseDelayMs <= retry.maxDelayMs,
    { message: "baseDelayMs must not exceed maxDelayMs", path: ["baseDelayMs"] },
  );

export const FileConfigSchema = z
  .object({
    /** Graph used when --graph_id is not given */
    graphId: z.string().min(1).optional(),
    api: ApiConfigSchema.optional(),
    /** Records requested per page (default: 100) */
    pageSize: z.number().int().positive().max(1000).optional(),
    retry: RetryConfigSchema.optional(),
  })
  .strict();

/** Environment variables read by the CLI; empty values count as unset */
export const EnvironmentSchema = z.object({
  GRAPH_JANITOR_API_KEY: z.string().optional(),
  GRAPH_JANITOR_GRAPH_ID: z.string().optional(),
  GRAPH_JANITOR_BASE_URL: z
    .string()
    .url({ message: "GRAPH_JANITOR_BASE_URL must be a URL" })
    .optional(),
});

// --- Types (inferred from schemas) ---

export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Fully resolved settings of one run.
 */
export interface RuntimeConfig {
  apiKey: string;
  baseUrl: string;
  requestTimeoutMs: number;
  /** Graph used when an action names none */
  defaultGraphId?: string;
  pageSize: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

export const DEFAULTS = {
  baseUrl: "https://api.getzep.com/api/v2",
  requestTimeoutMs: 30_000,
  pageSize: 100,
  retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8_000 },
} as const;
