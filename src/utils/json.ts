export type JsonStrategy = 'whole' | 'fenced' | 'braces';

export type JsonExtraction =
  | { found: true; value: unknown; strategy: JsonStrategy }
  | { found: false };

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pull JSON out of model output: the whole text, then a fenced block,
 * then the span from the first "{" to the last "}".
 */
export function extractJson(text: string): JsonExtraction {
  const whole = tryParse(text.trim());
  if (whole.ok) {
    return { found: true, value: whole.value, strategy: 'whole' };
  }

  const fence = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fence) {
    const fenced = tryParse(fence[1]);
    if (fenced.ok) {
      return { found: true, value: fenced.value, strategy: 'fenced' };
    }
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const braces = tryParse(text.slice(start, end + 1));
    if (braces.ok) {
      return { found: true, value: braces.value, strategy: 'braces' };
    }
  }

  return { found: false };
}
