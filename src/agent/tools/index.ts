export { TOOL_ALLOWED_PARAMS, TOOL_NAMES, TOOL_REQUIREMENTS, isToolName, type ToolName, type ToolRequirements } from "./catalog.js";
export { createToolRegistry, toToolSpec, toolRegistry, type ToolRegistry } from "./registry.js";
export type { ToolManifest, ToolPackage, ToolResult, ToolRunContext, ToolRuntime, ToolSpec } from "./types.js";
