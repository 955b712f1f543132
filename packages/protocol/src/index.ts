// Tool catalog
export {
  TOOL_SHAPES, TOOL_INFO, TOOL_NAMES,
  PLANES, FEATURE_OPERATIONS, EXTRUDE_DIRECTIONS, EDGE_SELECTIONS, FACE_SELECTIONS,
  isToolName, toolSchema, listTools,
} from './catalog.js';
export type {
  ToolName, ToolParams, ToolSchema, ToolInfo, ToolCategory, ToolSummary, ParameterSummary,
  PlaneName, FeatureOperation, ExtrudeDirection, EdgeSelection, FaceSelection,
} from './catalog.js';

// Tool calls
export { createToolCall, parseToolParams, freezeToolCall, toolCallsEqual, paramValueSchema, parametersSchema } from './tool-call.js';
export type { ToolCall, ToolParameters, ParamValue } from './tool-call.js';

// Errors
export {
  ERROR_CODES,
  CadLinkError, UnknownToolError, ParameterError, CompilationError, MalformedMessageError,
  ConnectionError, ConnectionLostError, ConnectionRefusedError, TimeoutError,
  NoActiveDocumentError, RemoteError,
  isCadLinkError, errorToPayload, errorFromPayload,
} from './errors.js';
export type { ErrorCode, ErrorPayload, ErrorContext } from './errors.js';

// Wire codec
export {
  MAX_FRAME_BYTES,
  encodeFrame, decodeFrame, FrameDecoder,
  encodeMessage, decodeMessage, parsePayload,
  encode, decode, encodeResult, encodeError, decodeResult,
} from './codec.js';
export type { WireMessage, ReplyMessage, RequestMessage, ResponseMessage, ErrorMessage } from './codec.js';

// Logging
export { createLogger, silentLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

// Configuration
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { CadLinkConfig, ServerMode } from './config.js';
