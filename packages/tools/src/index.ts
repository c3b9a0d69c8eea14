// Core tool infrastructure
export type { ToolDefinition, ToolResult, ToolExecutionContext } from './types.js';
export { DEFAULT_SESSION_ID } from './types.js';
export { ToolRegistry } from './registry.js';
export { withTimeout, ToolTimeoutError } from './timeout.js';
export { invokeWithLogging } from './invoke.js';
export { encodeProductLink, decodeProductLink } from './url.js';

// Browser-driving tools (executor agent)
export * from './shopping/index.js';

// Product search (searcher agent)
export * from './search/index.js';
