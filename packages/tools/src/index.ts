export { McpToolRegistry, MCP_PROTOCOL_VERSION, TOOL_ERROR_CODE } from "./mcp-client.js";
export type { McpToolRegistryOptions } from "./mcp-client.js";
