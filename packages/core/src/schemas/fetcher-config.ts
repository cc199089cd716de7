import { z } from "zod";
import { DEFAULT_GATEWAY_URL, DEFAULT_PARAM_DIR } from "../config/defaults.js";

export const DEFAULTS = {
  paramDir: DEFAULT_PARAM_DIR,
  gatewayUrl: DEFAULT_GATEWAY_URL,
  trustParams: false,
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const LoggingConfigSchema = z.object({
  level: LogLevel.default(DEFAULTS.logging.level),
  pretty: z.boolean().default(DEFAULTS.logging.pretty),
});

export const FetcherConfigSchema = z.object({
  paramDir: z.string().min(1).default(DEFAULTS.paramDir),
  gatewayUrl: z
    .url()
    .default(DEFAULTS.gatewayUrl)
    .describe("Prefix the content id is appended to"),
  trustParams: z
    .boolean()
    .default(DEFAULTS.trustParams)
    .describe("Skip all digest checks. Never enable in production"),
  logging: LoggingConfigSchema.default(DEFAULTS.logging),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
