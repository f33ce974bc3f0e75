// JSON extraction from model output — models wrap JSON in prose or code fences

export type JsonExtraction =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

function balancedObject(text: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/** Locate and parse the first top-level JSON object in `text`. */
export function extractJsonObject(text: string): JsonExtraction {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : text;
  const start = body.indexOf('{');
  if (start === -1) return { ok: false, reason: 'no JSON object in output' };

  const candidate = balancedObject(body, start);
  if (!candidate) return { ok: false, reason: 'unterminated JSON object' };

  try {
    const value: unknown = JSON.parse(candidate);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: `malformed JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
}
