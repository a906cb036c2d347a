/**
 * Reference extraction and resolution.
 */

export {
  extractReferences,
  referenceFreeTitle,
  type ExtractedReference,
} from "./patterns.js";

export {
  resolveReference,
  resolveReferences,
  resolveReferencesWithSummary,
  AmbiguousReferenceError,
  type ReferenceResolution,
  type ResolutionSummary,
} from "./resolver.js";
