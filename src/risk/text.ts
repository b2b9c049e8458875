// Anything after one of these ends a comment's "sentence".
const SENTENCE_END = /[.!?;\n]/;

export const CONTEXT_LIMIT = 80;

/**
 * Text of `source` from `start` up to the next sentence boundary, trimmed and
 * capped at `limit` characters. Leading ":" / "-" separators are dropped.
 */
export function sentenceFrom(source: string, start: number, limit = CONTEXT_LIMIT): string {
  let rest = source.slice(start).replace(/^[\s:\-]+/, "");
  const end = rest.search(SENTENCE_END);
  if (end !== -1) rest = rest.slice(0, end);
  return rest.trim().slice(0, limit).trim();
}

export const normalise = (value?: string) => (value ?? "").trim().toLowerCase();
