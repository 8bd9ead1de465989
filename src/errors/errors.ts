/**
 * Resource errors — the failures a bundle resolution can end in.
 *
 * All of them are configuration errors: a broken install, a mode that cannot
 * work where the code runs, or a typo in a selector. None is retried and no
 * partial bundle is returned alongside them.
 */

export type ResourceErrorCode =
  | "RESOURCE_NOT_FOUND"
  | "UNSUPPORTED_LOCATION"
  | "UNKNOWN_MODE"
  | "INVALID_CONFIG"
  | "INVALID_BASE_URL";

export interface ResourceErrorOptions {
  metadata?: Record<string, string>;
  cause?: unknown;
}

export abstract class ResourceError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ResourceErrorCode;
  readonly metadata: Record<string, string>;

  constructor(message: string, options: ResourceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.metadata = options.metadata ?? {};
  }
}

/** A bundled asset is missing from the resource set. */
export class ResourceNotFoundError extends ResourceError {
  readonly _tag = "ResourceNotFoundError" as const;
  readonly code = "RESOURCE_NOT_FOUND" as const;
  readonly path: string;

  constructor(path: string, options: ResourceErrorOptions = {}) {
    super(`resource '${path}' not found`, {
      ...options,
      metadata: { path, ...options.metadata },
    });
    this.path = path;
  }
}

/**
 * A local mode found the resource, but not on the filesystem
 * (e.g. inside a packaged archive). Pick a different mode.
 */
export class UnsupportedLocationError extends ResourceError {
  readonly _tag = "UnsupportedLocationError" as const;
  readonly code = "UNSUPPORTED_LOCATION" as const;
  readonly path: string;
  readonly protocol: string;

  constructor(path: string, protocol: string) {
    super(`unable to load ${path} due to invalid protocol: ${protocol}`, {
      metadata: { path, protocol },
    });
    this.path = path;
    this.protocol = protocol;
  }
}

export class UnknownModeError extends ResourceError {
  readonly _tag = "UnknownModeError" as const;
  readonly code = "UNKNOWN_MODE" as const;
  readonly mode: string;

  constructor(mode: string, known: readonly string[]) {
    super(`no such resources mode: '${mode}' (expected one of ${known.join(", ")})`, {
      metadata: { mode },
    });
    this.mode = mode;
  }
}

export class ConfigurationError extends ResourceError {
  readonly _tag = "ConfigurationError" as const;
  readonly code: "INVALID_CONFIG" | "INVALID_BASE_URL";

  constructor(
    code: "INVALID_CONFIG" | "INVALID_BASE_URL",
    message: string,
    options: ResourceErrorOptions = {},
  ) {
    super(message, options);
    this.code = code;
  }
}

export function isResourceError(err: unknown): err is ResourceError {
  return err instanceof ResourceError;
}
