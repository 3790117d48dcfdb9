// This module centralizes server identity values so protocol metadata and HTTP routes stay in sync.

export const MCP_SERVER_NAME = 'project-tracker-mcp';
export const MCP_SERVER_VERSION = '1.0.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';

// Newest first; the first entry is offered when a client asks for an unknown revision.
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [MCP_PROTOCOL_VERSION, '2025-03-26', '2024-11-05'];

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// This helper returns protocol version metadata extended with local timestamp for diagnostics.
export function formatProtocolVersionWithTimestamp(now = new Date()): string {
  const datePart = `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
  const timePart = `${pad2(now.getHours())}-${pad2(now.getMinutes())}-${pad2(now.getSeconds())}`;
  return `${MCP_PROTOCOL_VERSION} - ${datePart} - ${timePart}`;
}
