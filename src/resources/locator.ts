/**
 * Resource locators — pluggable lookup of bundled BokehJS assets.
 *
 * A locator maps a path inside the resource set (`js/bokeh.min.js`, or a
 * directory such as `js`) to a URL. Only `file:` URLs live on a real
 * filesystem; anything else can be read but not linked to from a page.
 */

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { ResourceNotFoundError } from "../errors/errors.js";

export interface ResourceLocator {
  /** Locator type identifier (e.g., 'directory', 'memory') */
  readonly type: string;

  /** URL of the file or directory at `path`, or undefined when absent. */
  locate(path: string): URL | undefined;

  /**
   * Full text of a located file.
   * @throws ResourceNotFoundError if the URL does not belong to this locator or is gone
   */
  read(url: URL): string;
}

function normalizeResourcePath(path: string): string {
  return path.replace(/^(\.\/|\/)+/, "").replace(/\/+$/, "");
}

/**
 * Directory locator — assets unpacked on disk under a root directory.
 * Paths that escape the root are never located.
 */
export class DirectoryLocator implements ResourceLocator {
  readonly type = "directory";
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  locate(path: string): URL | undefined {
    const full = resolve(this.root, normalizeResourcePath(path));
    const rel = relative(this.root, full);
    if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return undefined;
    }
    return existsSync(full) ? pathToFileURL(full) : undefined;
  }

  read(url: URL): string {
    if (url.protocol !== "file:") {
      throw new ResourceNotFoundError(url.href);
    }
    const file = fileURLToPath(url);
    try {
      return readFileSync(file, "utf-8");
    } catch (err) {
      throw new ResourceNotFoundError(file, { cause: err });
    }
  }
}

function memoryUrl(key: string): URL {
  return new URL(`memory:${key}`);
}

/**
 * Memory locator — assets held in memory, e.g. read out of a packaged
 * archive. URLs use the `memory:` protocol; directories are located by
 * prefix.
 */
export class MemoryLocator implements ResourceLocator {
  readonly type = "memory";
  private readonly files: Map<string, string>;
  /** Contents keyed by URL pathname, i.e. as `locate` encodes them. */
  private readonly byPathname: Map<string, string>;

  constructor(files: Record<string, string> | Map<string, string>) {
    const entries = files instanceof Map ? [...files] : Object.entries(files);
    this.files = new Map(entries.map(([path, content]): [string, string] => [normalizeResourcePath(path), content]));
    this.byPathname = new Map([...this.files].map(([key, content]): [string, string] => [memoryUrl(key).pathname, content]));
  }

  locate(path: string): URL | undefined {
    const key = normalizeResourcePath(path);
    if (this.files.has(key)) return memoryUrl(key);

    const prefix = `${key}/`;
    for (const name of this.files.keys()) {
      if (name.startsWith(prefix)) return memoryUrl(key);
    }
    return undefined;
  }

  read(url: URL): string {
    const content = url.protocol === "memory:" ? this.byPathname.get(url.pathname) : undefined;
    if (content === undefined) {
      throw new ResourceNotFoundError(url.href);
    }
    return content;
  }
}

/**
 * Locator chain — tries multiple locators in order.
 *
 * The first locator that finds a path wins; reads go to the first locator
 * that recognises the URL.
 */
export class LocatorChain implements ResourceLocator {
  readonly type = "chain";
  private readonly locators: ResourceLocator[];

  constructor(locators: ResourceLocator[]) {
    this.locators = locators;
  }

  locate(path: string): URL | undefined {
    for (const locator of this.locators) {
      const url = locator.locate(path);
      if (url) return url;
    }
    return undefined;
  }

  read(url: URL): string {
    for (const locator of this.locators) {
      try {
        return locator.read(url);
      } catch (err) {
        if (!(err instanceof ResourceNotFoundError)) throw err;
      }
    }
    throw new ResourceNotFoundError(url.href);
  }
}
