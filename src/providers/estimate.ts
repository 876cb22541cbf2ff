/**
 * Rough token estimates for reserving rate-limit budget before a call.
 */

/** Approximate characters per token for English text */
export const CHARS_PER_TOKEN = 4;

/** Role and framing tokens added per chat message */
export const MESSAGE_OVERHEAD_TOKENS = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Estimated units for a chat request: every message's content plus its
 * framing overhead, plus the output budget the request asks for.
 */
export function estimateMessageTokens(
  messages: ReadonlyArray<{ content: string }>,
  maxOutputTokens: number = 0
): number {
  let total = maxOutputTokens;
  for (const message of messages) {
    total += estimateTokens(message.content) + MESSAGE_OVERHEAD_TOKENS;
  }
  return total;
}
