// This file defines JSON-RPC envelopes and MCP protocol payload types shared by the dispatcher and the HTTP transport.

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type DescriptorCategory = 'tool' | 'resource' | 'prompt';

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface McpResource extends McpTool {
  uri: string;
  mimeType: string;
}

export interface McpPromptArgument {
  name: string;
  description?: string;
  required: boolean;
}

export interface McpPrompt extends McpTool {
  arguments: McpPromptArgument[];
}

export interface McpTextContent {
  type: 'text';
  text: string;
}

// This type captures the MCP tool output format returned to the client.
export interface ToolCallResult {
  content: McpTextContent[];
  isError?: boolean;
}

export interface ResourceReadResult {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
}

export interface PromptGetResult {
  description?: string;
  messages: Array<{ role: 'user' | 'assistant'; content: McpTextContent }>;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: Record<string, Record<string, unknown>>;
  serverInfo: {
    name: string;
    version: string;
  };
  instructions?: string;
}
