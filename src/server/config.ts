/**
 * Web server configuration from environment variables.
 */

import { z } from "zod";

const emptyAsUnset = (value: unknown) => (value === "" ? undefined : value);

const serverEnvSchema = z.object({
  PORT: z.preprocess(emptyAsUnset, z.coerce.number().int().min(0).max(65535).default(5000)),
  HOST: z.preprocess(emptyAsUnset, z.string().default("127.0.0.1")),
  /** Per-file upload limit in megabytes */
  MAX_UPLOAD_MB: z.preprocess(emptyAsUnset, z.coerce.number().positive().default(50)),
});

export interface ServerConfig {
  port: number;
  host: string;
  /** Per-file upload limit in bytes */
  maxUploadBytes: number;
}

/**
 * Read PORT, HOST and MAX_UPLOAD_MB.
 *
 * @throws {ZodError} if a value is set but invalid
 */
export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = serverEnvSchema.parse(env);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    maxUploadBytes: Math.floor(parsed.MAX_UPLOAD_MB * 1024 * 1024),
  };
}
