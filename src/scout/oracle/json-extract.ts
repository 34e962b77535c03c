/**
 * Pull a JSON object out of model output
 *
 * Tries the text as-is, then without a Markdown code fence, then the first
 * `{ ... }` span. Returns null when none of them parse.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.length === 0) return null;

  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const unfenced = trimmed
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
  const fenced = tryParse(unfenced);
  if (fenced !== undefined) return fenced;

  const match = /\{[\s\S]*\}/.exec(trimmed);
  if (match) {
    const embedded = tryParse(match[0]);
    if (embedded !== undefined) return embedded;
  }

  return null;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
