export { IntentDispatcher } from "./dispatcher.js";
export {
  parseToolCall,
  isOperation,
  OPERATIONS,
  toolCallSchema,
  type ToolCall,
  type Operation,
} from "./tool-call.js";
export {
  DEFAULT_DISPATCH_OPTIONS,
  type DispatchOptions,
  type ToolResult,
  type RelatedField,
  type EncodingSummary,
  type RecommendedFieldResult,
} from "./types.js";
export { searchFields } from "./search.js";
export { relatedToField, relatedToKeywords, CATEGORY_BONUS } from "./related.js";
export { runToolCall, type ToolOutcome } from "./execute.js";
