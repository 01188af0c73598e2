import { logger } from "../logger.js";

/** Storage budget of the message column, in bytes. */
export const MESSAGE_MAX_BYTES = 4000;

/** Worst case for multi-byte text in that column. */
export const WORST_CASE_BYTES_PER_CHAR = 3;

export const MESSAGE_MAX_LENGTH = Math.floor(MESSAGE_MAX_BYTES / WORST_CASE_BYTES_PER_CHAR);

/**
 * Caps a message at {@link MESSAGE_MAX_LENGTH} UTF-16 code units. No marker
 * is appended to a cut message.
 */
export function truncateMessage(message: string | undefined): string | undefined {
  if (message === undefined || message.length <= MESSAGE_MAX_LENGTH) {
    return message;
  }
  logger.debug("Truncated issue message", "message", {
    length: message.length,
    maxLength: MESSAGE_MAX_LENGTH,
  });
  return message.slice(0, MESSAGE_MAX_LENGTH);
}
