export {
  ImplementationLanguage,
  Implementation,
  ModelReference,
  ModelReferenceList,
  requirementsOf,
  needsCompilation,
  model,
  widget,
  customModel,
  coffeeScript,
  javaScript,
} from "./references.js";
export type { Requirements } from "./references.js";
