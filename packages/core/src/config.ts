import { z } from "zod";
import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";

loadDotenv({ path: resolve(process.cwd(), ".env") });

export const configSchema = z.object({
  // Logging
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Data
  dataDir: z.string().default("./data"),
  persistConversations: z.boolean().default(true),

  // Display
  defaultCurrency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, "DEFAULT_CURRENCY must be a 3-letter currency code")
    .transform((code) => code.toUpperCase())
    .default("USD"),

  // Collaborators (price, fees, broadcast)
  collaboratorTimeoutMs: z.number().int().positive().default(8_000),
  collaboratorMaxAttempts: z.number().int().min(1).max(5).default(2),

  // Classification
  minIntentConfidence: z.number().min(0).max(1).default(0.7),

  // Response variation
  responseSeed: z.number().int().optional(),
  tipsEnabled: z.boolean().default(true),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

function optionalNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;

  const result = configSchema.safeParse({
    logLevel: process.env.LOG_LEVEL || "info",
    dataDir: process.env.DATA_DIR || "./data",
    persistConversations: process.env.PERSIST_CONVERSATIONS !== "false",
    defaultCurrency: process.env.DEFAULT_CURRENCY || "USD",
    collaboratorTimeoutMs: optionalNumber(process.env.COLLABORATOR_TIMEOUT_MS),
    collaboratorMaxAttempts: optionalNumber(process.env.COLLABORATOR_MAX_ATTEMPTS),
    minIntentConfidence: optionalNumber(process.env.MIN_INTENT_CONFIDENCE),
    responseSeed: optionalNumber(process.env.RESPONSE_SEED),
    tipsEnabled: process.env.TIPS_ENABLED !== "false",
  });

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
