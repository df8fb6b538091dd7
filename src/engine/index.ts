export { formatProgressLine, ProgressChannel, type ProgressListener } from "./progress.js";
export { type SearchRequestInput, validateRequest } from "./request.js";
export {
  SearchEngine,
  type SearchEngineOptions,
  SearchExecution,
  type SubmitOptions,
} from "./search-engine.js";
