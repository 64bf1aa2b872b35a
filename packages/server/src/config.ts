import { z } from "zod";
import { DEFAULT_BASE_URL } from "@surface-route/clients-core";
import {
  DEFAULT_DIRECTIONS_PROFILE,
  DEFAULT_OPTIMIZATION_PROFILE,
} from "@surface-route/routing";

export interface ServerConfig {
  port: number;
  ors: {
    baseUrl: string;
    apiKey: string;
    timeout: number;
  };
  optimizationProfile: string;
  directionsProfile: string;
}

const envSchema = z.object({
  ORS_API_KEY: z.string().trim().min(1, "ORS_API_KEY is required"),
  ORS_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  ORS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  OPTIMIZATION_PROFILE: z.string().min(1).default(DEFAULT_OPTIMIZATION_PROFILE),
  DIRECTIONS_PROFILE: z.string().min(1).default(DEFAULT_DIRECTIONS_PROFILE),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

/**
 * Read the server configuration from environment variables.
 *
 * @throws Error listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    ors: {
      baseUrl: vars.ORS_BASE_URL,
      apiKey: vars.ORS_API_KEY,
      timeout: vars.ORS_TIMEOUT_MS,
    },
    optimizationProfile: vars.OPTIMIZATION_PROFILE,
    directionsProfile: vars.DIRECTIONS_PROFILE,
  };
}
