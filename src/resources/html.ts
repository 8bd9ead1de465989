/**
 * HTML serialisation of resolved bundles, for page templates.
 */

import type { AssetBundle, ResourceTag } from "./resolver.js";

const ATTR_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"']/g, ch => ATTR_ESCAPES[ch] ?? ch);
}

/** Keep inline content from closing its own element early. */
function escapeRawText(content: string, tag: "script" | "style"): string {
  return content.replace(new RegExp(`</(${tag})`, "gi"), "<\\/$1");
}

export function renderTag(tag: ResourceTag): string {
  const { source } = tag;

  if (tag.kind === "script") {
    switch (source.type) {
      case "inline":
        return `<script type="text/javascript">${escapeRawText(source.content, "script")}</script>`;
      case "file":
        return `<script type="text/javascript" src="${escapeAttribute(source.path)}"></script>`;
      case "url":
        return `<script type="text/javascript" src="${escapeAttribute(source.url)}"></script>`;
    }
  }

  switch (source.type) {
    case "inline":
      return `<style>${escapeRawText(source.content, "style")}</style>`;
    case "file":
      return `<link rel="stylesheet" href="${escapeAttribute(source.path)}" type="text/css">`;
    case "url":
      return `<link rel="stylesheet" href="${escapeAttribute(source.url)}" type="text/css">`;
  }
}

/** Stylesheets first, then scripts, one tag per line. */
export function renderBundle(bundle: AssetBundle): string {
  return [...bundle.styles, ...bundle.scripts].map(renderTag).join("\n");
}
