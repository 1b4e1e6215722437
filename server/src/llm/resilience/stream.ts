/**
 * Stream Fallback Chunks
 *
 * When a stream dies, the non-streaming failover result is replayed as two
 * chunks (content, then terminator). When even that fails, the stream ends
 * with one error chunk.
 */

import { nanoid } from "nanoid";
import type { ApiResponse, ChatChunk } from "../types.js";

export const STREAM_ERROR_MESSAGE = "ERROR: An unexpected error occurred. Please try again.";

function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function messageText(response: ApiResponse): string {
  const content = response.choices[0]?.message?.content;
  if (typeof content === "string") return content;
  if (!content) return "";
  return content
    .map(part => (part.type === "text" ? part.text : ""))
    .join("");
}

export function synthesizeChunks(response: ApiResponse): [ChatChunk, ChatChunk] {
  const content = messageText(response);
  const base = {
    id: response.id,
    object: "chat.completion.chunk" as const,
    created: response.created,
    model: response.model,
  };
  return [
    {
      ...base,
      choices: [{ index: 0, delta: content ? { content } : {}, finish_reason: null }],
    },
    {
      ...base,
      choices: [{ index: 0, delta: {}, finish_reason: response.choices[0]?.finish_reason ?? "stop" }],
    },
  ];
}

export function errorChunk(model: string, requestId?: string): ChatChunk {
  return {
    id: `error-${nanoid(10)}`,
    object: "chat.completion.chunk",
    created: unixSeconds(),
    model,
    choices: [
      {
        index: 0,
        delta: {
          content: requestId ? `${STREAM_ERROR_MESSAGE} (request ${requestId})` : STREAM_ERROR_MESSAGE,
        },
        finish_reason: "error",
      },
    ],
  };
}

/** Text carried by a chunk's deltas. */
export function chunkContent(chunk: ChatChunk): string {
  let text = "";
  for (const choice of chunk.choices) {
    if (typeof choice.delta.content === "string") text += choice.delta.content;
  }
  return text;
}
