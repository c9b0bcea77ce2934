export type ModelJsonResult =
  | { ok: true; value: unknown; repaired: boolean }
  | { ok: false; error: string; candidate: string };

function tryParse(text: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

export function stripCodeFences(text: string): string {
  const fence = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(text);
  if (fence?.[1]) return fence[1].trim();
  return text.trim();
}

/**
 * Last top-level {...} in the text, string-aware
 */
export function extractLastJsonObject(text: string): string | null {
  const cleaned = stripCodeFences(text);
  let last: string | null = null;
  let depth = 0;
  let inString = false;
  let escape = false;
  let start = -1;

  for (let i = 0; i < cleaned.length; i++) {
    const ch = cleaned[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === '\\') {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0 && start !== -1) {
        last = cleaned.slice(start, i + 1);
        start = -1;
      }
      if (depth < 0) return null;
    }
  }

  return last;
}

/**
 * Parse model output that should be a JSON object.
 * Strips fences, keeps the last balanced object, then retries once with
 * trailing commas removed and missing closing braces appended.
 */
export function parseModelJson(raw: string): ModelJsonResult {
  const candidate = extractLastJsonObject(raw) ?? stripCodeFences(raw);

  const direct = tryParse(candidate);
  if (direct) {
    return { ok: true, value: direct.value, repaired: false };
  }

  let repaired = candidate.replace(/,\s*([}\]])/g, '$1');
  const open = (repaired.match(/{/g) ?? []).length;
  const close = (repaired.match(/}/g) ?? []).length;
  if (open > close) repaired += '}'.repeat(open - close);

  const fixed = tryParse(repaired);
  if (fixed) {
    return { ok: true, value: fixed.value, repaired: true };
  }

  return { ok: false, error: 'Failed to parse JSON from model output', candidate };
}
