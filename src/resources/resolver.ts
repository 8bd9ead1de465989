/**
 * Resource resolver — computes the BokehJS bundle for a document.
 *
 * Given the models a document references and a deployment mode, picks the
 * components needed (core, widgets, compiler), resolves each one's script
 * and stylesheet under the mode's location rule, and appends the log level
 * snippet. Resolution is synchronous and either yields the whole bundle or
 * throws; there are no partial bundles.
 */

import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { fileURLToPath } from "node:url";
import type { AssetComponent, AssetKind } from "../components/components.js";
import { hasAsset, selectComponents } from "../components/components.js";
import type { ModelReference } from "../models/references.js";
import type { DeploymentMode, LogLevel } from "../modes/modes.js";
import type { ResolutionLogger, ResourceEventType } from "../events/logger.js";
import { ConfigurationError, ResourceNotFoundError, UnsupportedLocationError, isResourceError } from "../errors/errors.js";
import { BOKEH_VERSION } from "../version.js";
import type { ResourceLocator } from "./locator.js";
import { DirectoryLocator } from "./locator.js";
import { resourceName, resourcePath } from "./naming.js";

export type TagSource =
  | { type: "inline"; content: string }
  | { type: "file"; path: string }
  | { type: "url"; url: string };

export interface ResourceTag {
  kind: "script" | "style";
  source: TagSource;
}

export interface AssetBundle {
  scripts: ResourceTag[];
  styles: ResourceTag[];
}

/** Read-only environment a resolution runs against. */
export interface ResolveEnvironment {
  locator: ResourceLocator;
  /** Base for relative-mode paths. */
  cwd: string;
  /** Version segment of remote file names. */
  version: string;
  logger?: ResolutionLogger;
}

/**
 * Where the BokehJS build drops its `js/` and `css/` output inside the
 * package. Nothing is checked in there; until the build has run, only the
 * remote modes resolve without a configured resource root.
 */
export const DEFAULT_ASSET_ROOT = fileURLToPath(new URL("../../assets/", import.meta.url));

export function defaultEnvironment(overrides: Partial<ResolveEnvironment> = {}): ResolveEnvironment {
  return {
    locator: overrides.locator ?? new DirectoryLocator(DEFAULT_ASSET_ROOT),
    cwd: overrides.cwd ?? process.cwd(),
    version: overrides.version ?? BOKEH_VERSION,
    logger: overrides.logger,
  };
}

/**
 * Resolve the bundle for `refs` under `mode`.
 *
 * Scripts: one per selected component in selection order, then the log
 * level snippet. Styles: one per selected component that ships css.
 *
 * @throws ResourceNotFoundError when an inline asset or a local asset directory is missing
 * @throws UnsupportedLocationError when a local mode finds assets off the filesystem
 * @throws ConfigurationError when a remote URL cannot be built
 */
export function resolveBundle(
  mode: DeploymentMode,
  refs: readonly ModelReference[],
  env: Partial<ResolveEnvironment> = {},
): AssetBundle {
  const environment = defaultEnvironment(env);
  const components = selectComponents(refs);

  try {
    const scripts = components
      .filter(c => hasAsset(c, "js"))
      .map(c => resolveAsset(mode, c, "js", environment));
    scripts.push(logLevelScript(mode.logLevel));

    const styles = components
      .filter(c => hasAsset(c, "css"))
      .map(c => resolveAsset(mode, c, "css", environment));

    logEvent(environment.logger, "resources.bundle.resolved", {
      mode: mode.name,
      components: components.map(c => c.name),
      scripts: scripts.length,
      styles: styles.length,
    });

    return { scripts, styles };
  } catch (err) {
    logEvent(environment.logger, "resources.bundle.failed", {
      mode: mode.name,
      components: components.map(c => c.name),
      code: isResourceError(err) ? err.code : "UNKNOWN",
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

function logEvent(
  logger: ResolutionLogger | undefined,
  type: ResourceEventType,
  payload: Record<string, unknown>,
): void {
  try {
    logger?.log(type, payload);
  } catch {
    // Logging errors should not change the resolution outcome
  }
}

/** Inline snippet setting the BokehJS client log level. */
export function logLevelScript(level: LogLevel): ResourceTag {
  return { kind: "script", source: { type: "inline", content: `Bokeh.set_log_level('${level}');` } };
}

function resolveAsset(
  mode: DeploymentMode,
  component: AssetComponent,
  ext: AssetKind,
  env: ResolveEnvironment,
): ResourceTag {
  const kind = ext === "js" ? "script" : "style";
  const location = mode.location;

  switch (location.kind) {
    case "inline": {
      const path = resourcePath(component, ext, mode.minified);
      const url = env.locator.locate(path);
      if (!url) throw new ResourceNotFoundError(path);
      return { kind, source: { type: "inline", content: env.locator.read(url) } };
    }
    case "local": {
      const dir = localDirectory(ext, location.paths, env);
      return { kind, source: { type: "file", path: join(dir, resourceName(component, ext, mode.minified)) } };
    }
    case "remote": {
      const name = resourceName(component, ext, mode.minified, env.version);
      return { kind, source: { type: "url", url: joinUrl(location.baseUrl, `./${name}`) } };
    }
  }
}

/** Filesystem directory holding `js` or `css` assets, rewritten for the mode. */
function localDirectory(ext: AssetKind, paths: "relative" | "absolute", env: ResolveEnvironment): string {
  const url = env.locator.locate(ext);
  if (!url) throw new ResourceNotFoundError(ext);
  if (url.protocol !== "file:") {
    throw new UnsupportedLocationError(ext, url.protocol.replace(/:$/, ""));
  }

  const dir = fileURLToPath(url);
  return paths === "absolute" ? resolve(dir) : relativize(env.cwd, dir);
}

/**
 * `file` relative to `cwd` when it lies under `cwd`; otherwise absolute.
 */
export function relativize(cwd: string, file: string): string {
  const abs = resolve(file);
  const rel = relative(resolve(cwd), abs);
  if (rel === "") return ".";
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return abs;
  return rel;
}

function joinUrl(base: string, ref: string): string {
  try {
    return new URL(ref, base).href;
  } catch (err) {
    throw new ConfigurationError("INVALID_BASE_URL", `invalid resources base URL: '${base}'`, {
      metadata: { baseUrl: base },
      cause: err,
    });
  }
}
