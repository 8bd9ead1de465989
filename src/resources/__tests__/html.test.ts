import { describe, it, expect } from "vitest";
import { escapeAttribute, renderBundle, renderTag } from "../html.js";

describe("renderTag", () => {
  it("renders inline scripts", () => {
    expect(renderTag({ kind: "script", source: { type: "inline", content: "Bokeh.set_log_level('info');" } })).toBe(
      `<script type="text/javascript">Bokeh.set_log_level('info');</script>`,
    );
  });

  it("renders script files and URLs with src", () => {
    expect(renderTag({ kind: "script", source: { type: "file", path: "js/bokeh.min.js" } })).toBe(
      `<script type="text/javascript" src="js/bokeh.min.js"></script>`,
    );
    expect(renderTag({ kind: "script", source: { type: "url", url: "https://cdn.example.com/bokeh.js" } })).toBe(
      `<script type="text/javascript" src="https://cdn.example.com/bokeh.js"></script>`,
    );
  });

  it("renders inline styles", () => {
    expect(renderTag({ kind: "style", source: { type: "inline", content: ".bk { color: red; }" } })).toBe(
      "<style>.bk { color: red; }</style>",
    );
  });

  it("renders stylesheet links", () => {
    expect(renderTag({ kind: "style", source: { type: "file", path: "/srv/css/bokeh.css" } })).toBe(
      `<link rel="stylesheet" href="/srv/css/bokeh.css" type="text/css">`,
    );
    expect(renderTag({ kind: "style", source: { type: "url", url: "https://cdn.example.com/bokeh.css" } })).toBe(
      `<link rel="stylesheet" href="https://cdn.example.com/bokeh.css" type="text/css">`,
    );
  });

  it("escapes attribute values", () => {
    expect(renderTag({ kind: "script", source: { type: "url", url: 'https://x.test/a.js?b=1&c="2"' } })).toBe(
      `<script type="text/javascript" src="https://x.test/a.js?b=1&amp;c=&quot;2&quot;"></script>`,
    );
  });

  it("keeps inline content from closing its element", () => {
    expect(renderTag({ kind: "script", source: { type: "inline", content: 'var s = "</SCRIPT>";' } })).toBe(
      `<script type="text/javascript">var s = "<\\/SCRIPT>";</script>`,
    );
    expect(renderTag({ kind: "style", source: { type: "inline", content: "a::after { content: '</style>'; }" } })).toBe(
      "<style>a::after { content: '<\\/style>'; }</style>",
    );
  });
});

describe("escapeAttribute", () => {
  it("escapes the five HTML metacharacters", () => {
    expect(escapeAttribute(`<a href='x'>&"`)).toBe("&lt;a href=&#39;x&#39;&gt;&amp;&quot;");
  });
});

describe("renderBundle", () => {
  it("puts styles before scripts, one per line", () => {
    const html = renderBundle({
      scripts: [
        { kind: "script", source: { type: "url", url: "https://cdn.example.com/bokeh.min.js" } },
        { kind: "script", source: { type: "inline", content: "Bokeh.set_log_level('info');" } },
      ],
      styles: [{ kind: "style", source: { type: "url", url: "https://cdn.example.com/bokeh.min.css" } }],
    });

    expect(html.split("\n")).toEqual([
      `<link rel="stylesheet" href="https://cdn.example.com/bokeh.min.css" type="text/css">`,
      `<script type="text/javascript" src="https://cdn.example.com/bokeh.min.js"></script>`,
      `<script type="text/javascript">Bokeh.set_log_level('info');</script>`,
    ]);
  });
});
