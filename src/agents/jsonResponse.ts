/**
 * Pulls the first balanced JSON object out of a model response. Handles
 * markdown fences, leading chatter and trailing commas. Returns undefined
 * when no object parses.
 */
export function extractFirstJson(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  if (start < 0) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < unfenced.length; i++) {
    const ch = unfenced[i];
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
      if (depth === 0) {
        return parseLenient(unfenced.slice(start, i + 1));
      }
    }
  }
  return undefined;
}

function parseLenient(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    try {
      return JSON.parse(candidate.replace(/,\s*([}\]])/g, '$1'));
    } catch {
      return undefined;
    }
  }
}

export function looksLikeCompleteJson(text: string): boolean {
  const trimmed = text.trim().replace(/```$/, '').trim();
  return trimmed.endsWith('}') || trimmed.endsWith(']');
}
