/**
 * Pulls a JSON value out of model output that may wrap it in a markdown fence
 * or surround it with prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const fenced = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/.exec(trimmed);
  if (fenced?.[1]) {
    const fromFence = tryParse(fenced[1].trim());
    if (fromFence.ok) {
      return fromFence.value;
    }
  }

  // Whichever opener comes first decides between an object and an array.
  const openers = (['{', '['] as const)
    .map((open) => ({ open, index: trimmed.indexOf(open) }))
    .filter((entry) => entry.index !== -1)
    .sort((a, b) => a.index - b.index);

  for (const { open, index } of openers) {
    const balanced = sliceBalanced(trimmed, index, open, open === '{' ? '}' : ']');
    if (balanced !== undefined) {
      const parsed = tryParse(balanced);
      if (parsed.ok) {
        return parsed.value;
      }
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}

type ParseAttempt = { readonly ok: true; readonly value: unknown } | { readonly ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

function sliceBalanced(text: string, start: number, open: string, close: string): string | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
    } else if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}
