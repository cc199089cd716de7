import {
  FetcherConfigSchema,
  type FetcherConfig,
} from "../schemas/fetcher-config.js";
import { ENV } from "./defaults.js";
import { resolveParamDir } from "./paths.js";

export interface LoadConfigOptions {
  /** Environment to read from (default: process.env). */
  env?: NodeJS.ProcessEnv;
  /** Values that win over the environment, e.g. CLI flags. */
  overrides?: Partial<Pick<FetcherConfig, "paramDir" | "gatewayUrl">>;
}

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Build the fetcher configuration from environment variables.
 * Unset and empty variables fall back to the schema defaults.
 *
 * @throws ZodError when a value does not validate
 */
export function loadConfig(options?: LoadConfigOptions): FetcherConfig {
  const env = options?.env ?? process.env;
  const level = readVar(env, ENV.logLevel);

  const config = FetcherConfigSchema.parse({
    paramDir: options?.overrides?.paramDir ?? readVar(env, ENV.paramDir),
    gatewayUrl: options?.overrides?.gatewayUrl ?? readVar(env, ENV.gateway),
    // Only the exact value "1" turns verification off.
    trustParams: readVar(env, ENV.trustParams) === "1",
    logging: {
      level: level?.toLowerCase(),
      pretty: readFlag(readVar(env, ENV.logPretty)),
    },
  });

  return { ...config, paramDir: resolveParamDir(config.paramDir) };
}
