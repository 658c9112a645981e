import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { getErrorMessage } from "../domain/errors.js";

export function jsonToolResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Failures reach the client as a tool error instead of a protocol error. */
export async function runTool(action: () => unknown): Promise<CallToolResult> {
  try {
    return jsonToolResult(await action());
  } catch (error) {
    return {
      isError: true,
      content: [
        {
          type: "text",
          text: JSON.stringify({ error: getErrorMessage(error) }, null, 2),
        },
      ],
    };
  }
}
