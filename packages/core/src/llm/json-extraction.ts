export type JsonObjectExtraction =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | { readonly ok: false; readonly reason: string };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(candidate: string): { parsed: true; value: unknown } | { parsed: false } {
  try {
    return { parsed: true, value: JSON.parse(candidate) as unknown };
  } catch {
    return { parsed: false };
  }
}

/**
 * Finds the first balanced `{ ... }` span, skipping braces inside string literals.
 */
function firstBalancedObject(text: string): string | undefined {
  const startIdx = text.indexOf('{');
  if (startIdx === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = startIdx; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
    } else if (ch === '\\' && inString) {
      escaped = true;
    } else if (ch === '"') {
      inString = !inString;
    } else if (!inString && ch === '{') {
      depth++;
    } else if (!inString && ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(startIdx, i + 1);
      }
    }
  }

  return undefined;
}

/**
 * Pulls a JSON object out of a model response. Tries, in order: the whole
 * response, the first fenced code block, the first balanced brace span.
 */
export function extractJsonObject(content: string): JsonObjectExtraction {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: 'Model response was empty' };
  }

  const candidates: string[] = [trimmed];

  const codeBlockMatch = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/.exec(trimmed);
  if (codeBlockMatch?.[1]) {
    candidates.push(codeBlockMatch[1].trim());
  }

  const balanced = firstBalancedObject(trimmed);
  if (balanced !== undefined) {
    candidates.push(balanced);
  }

  let sawNonObject = false;
  for (const candidate of candidates) {
    const result = tryParse(candidate);
    if (!result.parsed) {
      continue;
    }
    if (isJsonObject(result.value)) {
      return { ok: true, value: result.value };
    }
    sawNonObject = true;
  }

  if (sawNonObject) {
    return { ok: false, reason: 'Model response is JSON but not an object' };
  }

  return {
    ok: false,
    reason: `No JSON object found in model response: ${trimmed.slice(0, 100)}`,
  };
}
