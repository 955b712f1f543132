// Executor
export { CommandExecutor, DEFAULT_HOST, DEFAULT_PORT } from './executor.js';
export type { ExecutorOptions, ExecutorState, ExecutorStatus } from './executor.js';

// Handlers
export { HandlerTable, createHandlerTable, BUILTIN_HANDLERS } from './handlers.js';
export type { ToolHandler, HandlerMap } from './handlers.js';

// Documents
export { DocumentError } from './document.js';
export type {
  CadDocument, DocumentHost, Point3, CurveKind, FeatureType,
  SceneInfo, ObjectInfo, SketchSummary, BodySummary, FeatureSummary,
  SketchResult, CurveResult, FeatureResult,
  ExtrudeOptions, RevolveOptions, EdgeFeatureOptions, ShellOptions, MirrorOptions,
} from './document.js';
export { MemoryDocument, MemoryDocumentHost } from './memory-document.js';
