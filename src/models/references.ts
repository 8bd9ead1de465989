/**
 * Model references — what the caller wants rendered, as far as asset
 * selection is concerned.
 *
 * The reference kinds are a closed set. Each kind states up front which
 * optional BokehJS components it needs, so selection never inspects
 * runtime classes.
 */

import { z } from "zod";

/** Source language of a custom model's client-side implementation. */
export const ImplementationLanguage = z.enum(["coffeescript", "javascript"]);
export type ImplementationLanguage = z.infer<typeof ImplementationLanguage>;

export const Implementation = z.object({
  language: ImplementationLanguage,
  code: z.string(),
});
export type Implementation = z.infer<typeof Implementation>;

export const ModelReference = z.discriminatedUnion("kind", [
  // Any built-in model (plots, glyphs, ranges, tools, ...)
  z.object({ kind: z.literal("model"), type: z.string().min(1) }),
  // Interactive widget
  z.object({ kind: z.literal("widget"), type: z.string().min(1) }),
  // User extension shipping its own implementation
  z.object({
    kind: z.literal("custom"),
    type: z.string().min(1),
    implementation: Implementation,
  }),
]);
export type ModelReference = z.infer<typeof ModelReference>;

export const ModelReferenceList = z.array(ModelReference);

export interface Requirements {
  widgets: boolean;
  compiler: boolean;
}

/**
 * Optional components a single reference needs.
 * Only source that still has to be compiled in the browser pulls in the compiler.
 */
export function requirementsOf(ref: ModelReference): Requirements {
  switch (ref.kind) {
    case "model":
      return { widgets: false, compiler: false };
    case "widget":
      return { widgets: true, compiler: false };
    case "custom":
      return { widgets: false, compiler: needsCompilation(ref.implementation) };
  }
}

export function needsCompilation(impl: Implementation): boolean {
  switch (impl.language) {
    case "coffeescript":
      return true;
    case "javascript":
      return false;
  }
}

// --- Constructors ---

export function model(type: string): ModelReference {
  return { kind: "model", type };
}

export function widget(type: string): ModelReference {
  return { kind: "widget", type };
}

export function customModel(type: string, implementation: Implementation): ModelReference {
  return { kind: "custom", type, implementation };
}

export function coffeeScript(code: string): Implementation {
  return { language: "coffeescript", code };
}

export function javaScript(code: string): Implementation {
  return { language: "javascript", code };
}
