const SPECIAL_CHARACTERS = /[.*+?^${}()|[\]\\]/g;

/** Builds a pattern that matches `message` and nothing else. */
export function exactly(message: string): RegExp {
  const escaped = message.replace(SPECIAL_CHARACTERS, "\\$&");
  return new RegExp(`^${escaped}$`);
}
