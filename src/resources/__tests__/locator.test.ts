import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { DirectoryLocator, LocatorChain, MemoryLocator } from "../locator.js";
import { ResourceNotFoundError } from "../../errors/errors.js";
import { assetContent, makeAssetRoot } from "./helpers.js";

describe("DirectoryLocator", () => {
  let root: string;
  let locator: DirectoryLocator;

  beforeEach(async () => {
    root = await makeAssetRoot(["js/bokeh.min.js", "css/bokeh.min.css"]);
    locator = new DirectoryLocator(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("locates files as file: URLs", () => {
    expect(locator.locate("js/bokeh.min.js")?.href).toBe(pathToFileURL(join(root, "js", "bokeh.min.js")).href);
  });

  it("locates directories", () => {
    expect(locator.locate("css")?.protocol).toBe("file:");
  });

  it("tolerates leading ./ and /", () => {
    expect(locator.locate("./js/bokeh.min.js")).toBeDefined();
    expect(locator.locate("/js/bokeh.min.js")).toBeDefined();
  });

  it("returns undefined for missing paths", () => {
    expect(locator.locate("js/bokeh.js")).toBeUndefined();
  });

  it("never locates outside the root", () => {
    expect(locator.locate("../outside.js")).toBeUndefined();
  });

  it("reads located files", () => {
    const url = locator.locate("js/bokeh.min.js");
    expect(url && locator.read(url)).toBe(assetContent("js/bokeh.min.js"));
  });

  it("read throws ResourceNotFoundError for vanished files", () => {
    const url = pathToFileURL(join(root, "js", "gone.js"));
    expect(() => locator.read(url)).toThrow(ResourceNotFoundError);
  });
});

describe("MemoryLocator", () => {
  const locator = new MemoryLocator({ "js/bokeh.min.js": "core();", "/css/bokeh.min.css": ".bk {}" });

  it("locates files with memory: URLs", () => {
    expect(locator.locate("js/bokeh.min.js")?.href).toBe("memory:js/bokeh.min.js");
  });

  it("normalises leading slashes in stored paths", () => {
    expect(locator.locate("css/bokeh.min.css")).toBeDefined();
  });

  it("locates directories by prefix", () => {
    expect(locator.locate("js")?.href).toBe("memory:js");
    expect(locator.locate("img")).toBeUndefined();
  });

  it("reads located files", () => {
    const url = locator.locate("js/bokeh.min.js");
    expect(url && locator.read(url)).toBe("core();");
  });

  it("accepts a Map", () => {
    const fromMap = new MemoryLocator(new Map([["js/bokeh.js", "dev();"]]));
    const url = fromMap.locate("js/bokeh.js");
    expect(url && fromMap.read(url)).toBe("dev();");
  });

  it("reads keys holding a literal percent sign", () => {
    const odd = new MemoryLocator({ "js/a%zz.js": "odd();" });
    const url = odd.locate("js/a%zz.js");
    expect(url && odd.read(url)).toBe("odd();");
  });

  it("read throws ResourceNotFoundError for unknown percent-encoded paths", () => {
    expect(() => locator.read(new URL("memory:js/%zz.js"))).toThrow(ResourceNotFoundError);
  });

  it("read throws for foreign URLs", () => {
    expect(() => locator.read(new URL("file:///tmp/bokeh.js"))).toThrow(ResourceNotFoundError);
  });
});

describe("LocatorChain", () => {
  it("takes the first locator that finds a path", () => {
    const chain = new LocatorChain([
      new MemoryLocator({ "js/bokeh.min.js": "first" }),
      new MemoryLocator({ "js/bokeh.min.js": "second", "js/bokeh.js": "second-dev" }),
    ]);

    const url = chain.locate("js/bokeh.min.js");
    expect(url && chain.read(url)).toBe("first");
  });

  it("falls through to later locators", async () => {
    const root = await makeAssetRoot(["js/bokeh-widgets.min.js"]);
    try {
      const chain = new LocatorChain([new MemoryLocator({ "js/bokeh.min.js": "core" }), new DirectoryLocator(root)]);
      const url = chain.locate("js/bokeh-widgets.min.js");

      expect(url?.protocol).toBe("file:");
      expect(url && chain.read(url)).toBe(assetContent("js/bokeh-widgets.min.js"));
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("returns undefined when no locator finds the path", () => {
    expect(new LocatorChain([]).locate("js")).toBeUndefined();
  });
});
