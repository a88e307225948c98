/**
 * Configuration file loading
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ResolvedConfig } from "../types";
import { errorMessage } from "../utils/errors";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

/**
 * Load, validate and resolve a config file
 */
export async function loadConfig(configPath: string): Promise<ResolvedConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    const stat = await fs.stat(absolutePath);
    if (stat.isDirectory()) {
      throw new ConfigError(`Configuration file not found: ${absolutePath}`);
    }
    content = await fs.readFile(absolutePath, "utf8");
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    throw new ConfigError(`Configuration file not found: ${absolutePath}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Error loading configuration file: ${absolutePath} does not contain an object`);
  }

  const merged = deepMerge<object>(DEFAULT_CONFIG, parsed);

  validateConfig(merged);

  return resolvePaths(merged, absolutePath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Error loading configuration file: invalid YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json" || ext === ".conf" || ext === "") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Error loading configuration file: invalid JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .json, .yaml or .yml`);
}
