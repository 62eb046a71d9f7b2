import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";

export function jsonContents(uri: URL, value: unknown): ReadResourceResult {
  return { contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(value) }] };
}
