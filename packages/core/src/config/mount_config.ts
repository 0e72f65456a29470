/**
 * Mount configuration loading
 *
 * Reads a YAML (or JSON) file, validates it against mount_config.schema.json
 * and resolves source roots against the file's directory.
 *
 * @module config
 */

import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import { promises as fs } from "fs";
import * as yaml from "js-yaml";
import * as path from "path";
import mountConfigSchema from "./mount_config.schema.json";
import { MountConfigError } from "./mount_config.errors";
import type { MountConfig, MountConfigFile } from "./mount_config.types";

export const DEFAULT_CONFIG_FILE = "unionmount.yaml";

let validator: ValidateFunction<MountConfigFile> | null = null;

function getValidator(): ValidateFunction<MountConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<MountConfigFile>(mountConfigSchema);
  }
  return validator;
}

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath || "/";
  return `${location} ${error.message ?? "is invalid"}`;
}

/**
 * Validates `raw` and resolves relative roots against `baseDir`.
 * @throws MountConfigError listing every problem found
 */
export function parseMountConfig(raw: unknown, baseDir: string, configPath?: string): MountConfig {
  const validate = getValidator();
  if (!validate(raw)) {
    throw new MountConfigError(
      "Invalid mount configuration",
      configPath,
      (validate.errors ?? []).map(formatSchemaError)
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const { name } of raw.sources) {
    if (seen.has(name)) duplicates.push(`duplicate source name '${name}'`);
    seen.add(name);
  }
  if (duplicates.length > 0) {
    throw new MountConfigError("Invalid mount configuration", configPath, duplicates);
  }

  return {
    sources: raw.sources.map(({ name, root }) => ({ source: name, root: path.resolve(baseDir, root) })),
    patterns: raw.patterns.map(({ tag, pattern }) => ({ tag, pattern })),
    ignore: raw.ignore ?? [],
    logLevel: raw.logLevel,
    watch: raw.watch ?? {},
  };
}

export async function loadMountConfig(configPath: string): Promise<MountConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, "utf-8");
  } catch (err: unknown) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === "ENOENT") {
      throw new MountConfigError(`Config file not found: ${absolutePath}`, absolutePath);
    }
    throw new MountConfigError(`Failed to read config file ${absolutePath}: ${error.message}`, absolutePath);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MountConfigError(`Failed to parse config file ${absolutePath}: ${reason}`, absolutePath);
  }

  return parseMountConfig(raw, path.dirname(absolutePath), absolutePath);
}
