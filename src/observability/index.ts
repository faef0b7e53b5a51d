export { runPromise, disposeObservability } from "./runtime.js";
export { withSpan, annotateSpan, annotateError } from "./spans.js";
export {
  recordHttpMetrics,
  recordClockAction,
  recordUpstreamCall,
  recordError,
} from "./metrics.js";
