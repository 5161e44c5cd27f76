/**
 * Harness Configuration
 * Where the target repository lives, how to build it, and where results go
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const HarnessConfigSchema = z
  .object({
    repoPath: z.string().min(1).default("/opt/openstratos/server-rs"),
    manifestFile: z.string().min(1).default("Cargo.toml"),
    buildTool: z.string().min(1).default("cargo"),
    endpoint: z.string().url().default("http://staging.openstratos.org/test"),
    keyLength: z.number().int().positive().default(20),
  })
  .strict();

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

export const DEFAULT_CONFIG: HarnessConfig = HarnessConfigSchema.parse({});

/**
 * Build descriptor handed to the build tool
 */
export function manifestPath(config: HarnessConfig): string {
  return join(config.repoPath, config.manifestFile);
}

/**
 * Validate raw JSON content against the schema
 */
export function parseConfig(raw: unknown, source: string): HarnessConfig {
  const result = HarnessConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

function parseConfigContent(content: string, path: string): HarnessConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, error);
  }
  return parseConfig(raw, path);
}

/**
 * Load configuration.
 * Only an explicit path is read, and it must exist; without one the
 * compiled-in defaults apply.
 */
export async function loadConfig(configPath?: string): Promise<HarnessConfig> {
  if (!configPath) {
    return { ...DEFAULT_CONFIG };
  }

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error: unknown) {
    throw new ConfigError(`Could not read configuration file ${configPath}`, error);
  }
  return parseConfigContent(content, configPath);
}
