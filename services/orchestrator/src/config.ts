import { z } from "zod";

import { ConfigurationError } from "./errors.js";

const optionalSecret = z.string().min(1).optional();

/** Largest delay `setTimeout` honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = z.coerce.number().int().positive().max(MAX_TIMER_MS);

export const appConfigSchema = z.object({
  port: z.coerce.number().int().nonnegative(),
  uploadDir: z.string().min(1),
  maxConcurrency: positiveInt,
  adapterTimeoutMs: positiveInt,
  maxUploadFiles: positiveInt,
  tamper: z.object({
    baseUrl: z.string().url(),
    apiKey: optionalSecret,
    timeoutMs: positiveInt,
    pollingIntervalMs: positiveInt,
    maxStatusChecks: positiveInt,
  }),
  transcription: z.object({
    baseUrl: z.string().url(),
    apiKey: optionalSecret,
    timeoutMs: positiveInt,
    pollingIntervalMs: positiveInt,
    maxStatusChecks: positiveInt,
  }),
  llm: z.object({
    baseUrl: z.string().url(),
    apiKey: optionalSecret,
    model: z.string().min(1),
    timeoutMs: positiveInt,
  }),
  ledger: z.object({
    url: z.string().url().optional(),
    apiKey: optionalSecret,
    timeoutMs: positiveInt,
  }),
  database: z.object({
    url: z.string().optional(),
  }),
  objectStorage: z.object({
    bucket: z.string().optional(),
    region: z.string().optional(),
    endpoint: z.string().optional(),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    prefix: z.string().optional(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type TamperSettings = AppConfig["tamper"];
export type TranscriptionSettings = AppConfig["transcription"];
export type LlmSettings = AppConfig["llm"];
export type LedgerSettings = AppConfig["ledger"];
export type ObjectStorageConfig = AppConfig["objectStorage"];

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const candidate = {
    port: env.PORT ?? "8080",
    uploadDir: env.UPLOAD_DIR ?? "./uploads",
    maxConcurrency: env.MAX_CONCURRENCY ?? "4",
    adapterTimeoutMs: env.ADAPTER_TIMEOUT_MS ?? "900000",
    maxUploadFiles: env.MAX_UPLOAD_FILES ?? "20",
    tamper: {
      baseUrl: env.TAMPER_API_URL ?? "https://api.prd.realitydefender.xyz",
      apiKey: nonEmpty(env.TAMPER_API_KEY),
      timeoutMs: env.TAMPER_TIMEOUT_MS ?? "60000",
      pollingIntervalMs: env.TAMPER_POLL_INTERVAL_MS ?? "3000",
      maxStatusChecks: env.TAMPER_MAX_POLLS ?? "160",
    },
    transcription: {
      baseUrl: env.TRANSCRIPTION_API_URL ?? "https://api.assemblyai.com/v2",
      apiKey: nonEmpty(env.TRANSCRIPTION_API_KEY),
      timeoutMs: env.TRANSCRIPTION_TIMEOUT_MS ?? "60000",
      pollingIntervalMs: env.TRANSCRIPTION_POLL_INTERVAL_MS ?? "3000",
      maxStatusChecks: env.TRANSCRIPTION_MAX_POLLS ?? "100",
    },
    llm: {
      baseUrl: env.LLM_API_URL ?? "https://generativelanguage.googleapis.com/v1beta",
      apiKey: nonEmpty(env.LLM_API_KEY),
      model: env.LLM_MODEL ?? "gemini-2.5-flash",
      timeoutMs: env.LLM_TIMEOUT_MS ?? "120000",
    },
    ledger: {
      url: nonEmpty(env.LEDGER_URL),
      apiKey: nonEmpty(env.LEDGER_API_KEY),
      timeoutMs: env.LEDGER_TIMEOUT_MS ?? "30000",
    },
    database: {
      url: nonEmpty(env.DATABASE_URL),
    },
    objectStorage: {
      bucket: nonEmpty(env.OBJECT_BUCKET),
      region: nonEmpty(env.OBJECT_REGION),
      endpoint: nonEmpty(env.OBJECT_ENDPOINT),
      accessKeyId: nonEmpty(env.OBJECT_ACCESS_KEY_ID),
      secretAccessKey: nonEmpty(env.OBJECT_SECRET_ACCESS_KEY),
      prefix: nonEmpty(env.OBJECT_PREFIX),
    },
  };

  const parsed = appConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
