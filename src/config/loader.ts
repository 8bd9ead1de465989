/**
 * Config loading — YAML file + env override → resolver settings.
 *
 * Precedence for the mode: explicit override (CLI flag), then the
 * BOKEH_RESOURCES environment variable, then the file, then `cdn`.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ConfigurationError } from "../errors/errors.js";
import type { ResolutionLogger } from "../events/logger.js";
import { JsonlEventLogger } from "../events/logger.js";
import type { DeploymentMode } from "../modes/modes.js";
import { requireMode, withBaseUrl } from "../modes/modes.js";
import type { ResourceLocator } from "../resources/locator.js";
import { DirectoryLocator, LocatorChain } from "../resources/locator.js";
import type { ResolveEnvironment } from "../resources/resolver.js";
import { DEFAULT_ASSET_ROOT } from "../resources/resolver.js";
import { MODE_ENV_VAR, ResourcesConfig } from "./schema.js";

export interface ResourceSettings {
  mode: DeploymentMode;
  environment: ResolveEnvironment;
}

export interface SettingsOverrides {
  /** Mode selector taking precedence over env and file. */
  mode?: string;
  /** Replaces `resourceRoots`. */
  resourceRoots?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: ResolutionLogger;
}

/**
 * Parse a config object, reporting every schema issue at once.
 */
export function parseConfig(raw: unknown, source: string = "config"): ResourcesConfig {
  const result = ResourcesConfig.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError("INVALID_CONFIG", `Invalid ${source}:\n  ${issues.join("\n  ")}`, {
      metadata: { source },
    });
  }
  return result.data;
}

/**
 * Load the config file at `configPath`. A missing file yields the defaults.
 * Relative `resourceRoots` and `eventLogDir` are resolved against the
 * file's directory.
 */
export async function loadConfig(configPath: string): Promise<ResourcesConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return parseConfig({}, configPath);
    throw err;
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError("INVALID_CONFIG", `Invalid YAML in ${configPath}`, {
      metadata: { source: configPath },
      cause: err,
    });
  }

  const config = parseConfig(raw, configPath);
  const baseDir = dirname(resolve(configPath));
  return {
    ...config,
    resourceRoots: config.resourceRoots.map(root => resolve(baseDir, root)),
    eventLogDir: config.eventLogDir !== undefined ? resolve(baseDir, config.eventLogDir) : undefined,
  };
}

/**
 * Turn a config into a mode and a resolve environment.
 *
 * @throws UnknownModeError if the effective selector is not a known mode
 */
export function buildSettings(config: ResourcesConfig, overrides: SettingsOverrides = {}): ResourceSettings {
  const env = overrides.env ?? process.env;
  const selector = overrides.mode ?? env[MODE_ENV_VAR] ?? config.mode;

  let mode = requireMode(selector);
  if (config.cdnUrl !== undefined) {
    mode = withBaseUrl(mode, config.cdnUrl);
  }

  const roots = overrides.resourceRoots ?? config.resourceRoots;
  const logger = overrides.logger
    ?? (config.eventLogDir !== undefined ? new JsonlEventLogger(config.eventLogDir) : undefined);

  return {
    mode,
    environment: {
      locator: createLocator(roots),
      cwd: overrides.cwd ?? process.cwd(),
      version: config.version,
      logger,
    },
  };
}

export function createLocator(roots: readonly string[]): ResourceLocator {
  if (roots.length === 0) return new DirectoryLocator(DEFAULT_ASSET_ROOT);
  if (roots.length === 1) return new DirectoryLocator(roots[0] ?? DEFAULT_ASSET_ROOT);
  return new LocatorChain(roots.map(root => new DirectoryLocator(root)));
}

/**
 * Write a config file holding the defaults (atomic: temp file + rename).
 */
export async function writeDefaultConfig(configPath: string): Promise<ResourcesConfig> {
  const config = parseConfig({});
  await writeFileAtomic(configPath, stringifyYaml(config, { lineWidth: 120 }), "utf-8");
  return config;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
