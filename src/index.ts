/**
 * jsonscope: navigation core for very large JSON documents.
 *
 * A session parses a document once, materializes tree nodes only as they
 * are expanded, keeps memory in check by evicting collapsed subtrees and
 * searches whatever is currently materialized.
 */

// ============================================================================
// SESSION
// ============================================================================

export {
  JsonScopeSession,
  type SessionOptions,
  type ExpandAllOptions,
  type NodeRef,
} from "./services/JsonScopeSession";

export { createJsonScopeEventBus, type JsonScopeEvents, type JsonScopeEventBus } from "./events";

// Document model
export {
  JsonDocument,
  parseDocument,
  decodeTree,
  type ElementRef,
  type JsonKind,
  type JsonScalar,
  type ParseDocumentOptions,
} from "./document/JsonDocument";

export {
  openDocument,
  validateJson,
  writeDocumentText,
  isJsonFileName,
  type ValidationResult,
} from "./document/DocumentLoader";

export {
  ROOT_PATH,
  pathKey,
  pathFromKey,
  pathsEqual,
  parentPath,
  childPath,
  isAncestorPath,
  formatPath,
  displayPath,
  parsePathExpression,
  type PathSegment,
  type JsonPath,
} from "./document/JsonPath";

// Lazy tree
export { LazyNode, type LoadState, type LazyNodeInit } from "./tree/LazyNode";
export { LazyTree, type LazyTreeOptions, type EvictOutcome, type EvictRefusal } from "./tree/LazyTree";
export { NodeRegistry, type RegistryStats } from "./tree/NodeRegistry";
export { visibleRows, countVisibleRows, type VisibleRow, type VisibleRowsOptions } from "./tree/visibleRows";
export { serializeTree, toJsonText } from "./tree/TreeSerializer";

export {
  ROOT_KEY,
  formatDisplayValue,
  createLazyNode,
  createRootNode,
  materializeChildren,
  materializeInBatches,
  type MaterializeOptions,
  type BatchOptions,
  type MaterializeResult,
} from "./services/TreeMaterializer";

// Services
export {
  analyzeStructure,
  summarizeStructure,
  type StructureInfo,
  type AnalyzeOptions,
} from "./services/StructureAnalyzer";

export {
  AsyncLoadCoordinator,
  type BatchRequest,
  type BatchSource,
  type LoadOptions,
  type LoadMoreOptions,
  type LoadStatus,
  type CoordinatorDeps,
} from "./services/AsyncLoadCoordinator";

export {
  MemoryPressureMonitor,
  INITIAL_MONITOR_STATE,
  evaluateMemorySample,
  findEvictionCandidates,
  processMemorySample,
  type PressureLevel,
  type CleanupAction,
  type CleanupReport,
  type MemorySample,
  type MemoryStatus,
  type MemoryDecision,
  type MonitorState,
  type MonitorDeps,
} from "./services/MemoryPressureMonitor";

export {
  SearchIndex,
  buildSearchIndex,
  ngramsOf,
  type MatchKind,
  type SearchIndexEntry,
  type SearchIndexStats,
  type BuildIndexOptions,
} from "./services/SearchIndex";

export {
  SearchEngine,
  scoreMatch,
  buildContext,
  wildcardToPattern,
  type SearchMode,
  type SearchOptions,
  type SearchResult,
  type SearchEngineDeps,
} from "./services/SearchEngine";

// Policies
export { DEFAULT_PARSE_POLICY, mergeParsePolicy, type ParsePolicy, type ParsePolicyInput } from "./config/ParsePolicy";
export {
  DEFAULT_LOAD_POLICY,
  mergeLoadPolicy,
  type LoadPolicy,
  type LoadPolicyInput,
  type TimeoutBehavior,
} from "./config/LoadPolicy";
export {
  DEFAULT_MEMORY_POLICY,
  mergeMemoryPolicy,
  type MemoryPolicy,
  type MemoryPolicyInput,
  type MemoryMetric,
} from "./config/MemoryPolicy";
export { DEFAULT_SEARCH_POLICY, mergeSearchPolicy, type SearchPolicy } from "./config/SearchPolicy";

// Error types
export {
  JsonScopeError,
  JsonParseError,
  JsonResolveError,
  JsonLoadError,
  JsonSearchError,
  JsonIoError,
  OperationCancelledError,
  ErrorCode,
  wrapError,
  isJsonScopeError,
  isCancellation,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry, type LogSink } from "./utils/logger";
export { withRetry, RetryPresets, type RetryConfig } from "./utils/retry";
export { createEventBus, type EventBus, type EventListener } from "./utils/eventBus";
export { formatByteSize } from "./utils/format";
