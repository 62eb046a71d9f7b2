import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { InvalidInputError } from "../validation.js";

export function textReply(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

/** Turns rejected input into an `Error:` reply; anything else propagates. */
export async function replyWith(run: () => Promise<string>): Promise<CallToolResult> {
  try {
    return textReply(await run());
  } catch (err) {
    if (err instanceof InvalidInputError) return textReply(`Error: ${err.message}`);
    throw err;
  }
}

export function notFound(id: string): string {
  return `Quest ${id} not found. Nothing changed.`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? "s" : ""}`;
}
