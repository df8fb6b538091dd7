export {
  type CompiledPattern,
  compilePattern,
  createMatcher,
  escapeRegex,
  type LineMatcher,
} from "./compile.js";
