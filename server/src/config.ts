import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../../scripts/lib/errors.js";

const ConfigFileSchema = z
  .object({
    port: z.number().int().positive().optional(),
    maxBodyBytes: z.number().int().positive().optional(),
    /** Page options applied to every request before its own */
    defaults: z.record(z.unknown()).optional(),
  })
  .strict();

export interface ServerConfig {
  port: number;
  maxBodyBytes: number;
  defaults: Record<string, unknown>;
}

/**
 * Config file (JSON, path given as first argument) wins over the
 * environment, which wins over the defaults.
 */
export function loadServerConfig(
  configPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  let raw: unknown = {};
  if (configPath) {
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to load config from ${configPath}: ${message}`, [
        { path: "config", message },
      ]);
    }
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join(".") || "(root)", message: i.message }));
    throw new ConfigError(
      `Invalid server config: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues
    );
  }
  const file = parsed.data;
  return {
    port: file.port ?? parseInt(env.PORT || "3000", 10),
    maxBodyBytes: file.maxBodyBytes ?? parseInt(env.MAX_BODY_BYTES || String(10 * 1024 * 1024), 10),
    defaults: file.defaults ?? {},
  };
}
