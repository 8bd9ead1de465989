/**
 * Deployment modes — where BokehJS assets come from and how they are tuned.
 *
 * A mode is plain configuration: a location plus the three fields the
 * development overlay changes (minification, log level, JSON indent).
 */

import { ConfigurationError, UnknownModeError } from "../errors/errors.js";
import { DEFAULT_CDN_URL } from "../version.js";

/** BokehJS client log levels, most verbose first. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type ModeLocation =
  | { readonly kind: "inline" }
  | { readonly kind: "local"; readonly paths: "relative" | "absolute" }
  | { readonly kind: "remote"; readonly baseUrl: string };

export interface DeploymentMode {
  readonly name: string;
  readonly location: ModeLocation;
  readonly dev: boolean;
  readonly minified: boolean;
  readonly logLevel: LogLevel;
  readonly indent: number;
}

export const MODE_NAMES = [
  "cdn",
  "cdn-dev",
  "inline",
  "inline-dev",
  "relative",
  "relative-dev",
  "absolute",
  "absolute-dev",
] as const;
export type ModeName = (typeof MODE_NAMES)[number];

export const DEFAULT_MODE_NAME: ModeName = "cdn";

function makeMode(name: string, location: ModeLocation, dev: boolean): DeploymentMode {
  return dev
    ? { name, location, dev, minified: false, logLevel: "debug", indent: 2 }
    : { name, location, dev, minified: true, logLevel: "info", indent: 0 };
}

const cdn: ModeLocation = { kind: "remote", baseUrl: DEFAULT_CDN_URL };
const inline: ModeLocation = { kind: "inline" };
const relative: ModeLocation = { kind: "local", paths: "relative" };
const absolute: ModeLocation = { kind: "local", paths: "absolute" };

export const MODES: Readonly<Record<ModeName, DeploymentMode>> = {
  "cdn": makeMode("cdn", cdn, false),
  "cdn-dev": makeMode("cdn-dev", cdn, true),
  "inline": makeMode("inline", inline, false),
  "inline-dev": makeMode("inline-dev", inline, true),
  "relative": makeMode("relative", relative, false),
  "relative-dev": makeMode("relative-dev", relative, true),
  "absolute": makeMode("absolute", absolute, false),
  "absolute-dev": makeMode("absolute-dev", absolute, true),
};

export const DEFAULT_MODE: DeploymentMode = MODES[DEFAULT_MODE_NAME];

export function isModeName(value: string): value is ModeName {
  return (MODE_NAMES as readonly string[]).includes(value);
}

/**
 * Look up a mode by its selector string (case-sensitive).
 * Returns undefined for anything unrecognised; there is no fallback.
 */
export function fromString(value: string): DeploymentMode | undefined {
  return isModeName(value) ? MODES[value] : undefined;
}

/** Like {@link fromString}, but unknown selectors throw. */
export function requireMode(value: string): DeploymentMode {
  const mode = fromString(value);
  if (!mode) throw new UnknownModeError(value, MODE_NAMES);
  return mode;
}

/**
 * Remote mode against a custom release directory.
 * A base without a trailing slash gets one, so file names join under it.
 */
export function remoteMode(baseUrl: string, dev: boolean = false, name?: string): DeploymentMode {
  let url: URL;
  try {
    url = new URL(baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  } catch (err) {
    throw new ConfigurationError("INVALID_BASE_URL", `invalid resources base URL: '${baseUrl}'`, {
      metadata: { baseUrl },
      cause: err,
    });
  }
  return makeMode(name ?? (dev ? "cdn-dev" : "cdn"), { kind: "remote", baseUrl: url.href }, dev);
}

/** Same mode, served from `baseUrl` when it is a remote one. */
export function withBaseUrl(mode: DeploymentMode, baseUrl: string): DeploymentMode {
  if (mode.location.kind !== "remote") return mode;
  return remoteMode(baseUrl, mode.dev, mode.name);
}

/** True when level `a` logs more than level `b`. */
export function isMoreVerbose(a: LogLevel, b: LogLevel): boolean {
  return LOG_LEVELS.indexOf(a) < LOG_LEVELS.indexOf(b);
}

/** Serialise `value` as JSON with the mode's indent (0 means compact). */
export function stringify(mode: DeploymentMode, value: unknown): string {
  return mode.indent > 0 ? JSON.stringify(value, null, mode.indent) : JSON.stringify(value);
}

/** Defer `code` until BokehJS has loaded. */
export function wrap(code: string): string {
  return `Bokeh.$(function() {\n${code}\n});`;
}
