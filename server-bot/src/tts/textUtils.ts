export function sanitizeMessageText(raw: string): string {
  const normalized = raw.replace(/\r\n?/g, "\n");
  // Remove non-printable control chars but preserve newlines and tabs.
  return normalized
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function isSpeakable(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}

const SENTENCE_ENDS = [".", "!", "?"];

function lastSplitPoint(text: string, maxLength: number): number {
  const window = text.slice(0, maxLength);
  let at = -1;
  for (const mark of SENTENCE_ENDS) {
    at = Math.max(at, window.lastIndexOf(mark));
  }
  if (at === -1) at = window.lastIndexOf("\n");
  if (at === -1) at = window.lastIndexOf(" ");
  return at === -1 ? maxLength : at + 1;
}

/**
 * Splits long text into chunks of at most `maxLength` characters, preferring
 * sentence ends, then line breaks, then spaces, and only then a hard cut.
 * Whitespace-only chunks are dropped; the rest keep their original spacing.
 */
export function splitText(text: string, maxLength: number): string[] {
  if (maxLength < 1) throw new Error("maxLength must be positive");
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > maxLength) {
    const cut = lastSplitPoint(rest, maxLength);
    const head = rest.slice(0, cut);
    if (head.trim()) chunks.push(head);
    rest = rest.slice(cut);
  }
  if (rest.trim()) chunks.push(rest);
  return chunks;
}
