type JsonRecord = Record<string, unknown>;

const JSON_FENCE = /```json\s*([\s\S]*?)```/gi;
const ANY_FENCE = /```[\w-]*\s*([\s\S]*?)```/g;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type JsonLocation =
  | { status: 'found'; value: JsonRecord }
  /** An outer bracket opened and never closed, as in a reply cut off mid-object. */
  | { status: 'truncated' }
  | { status: 'absent' };

/**
 * Finds the JSON object a model embedded in free text. Fenced ```json blocks win over
 * other fences, which win over a bracket scan of the whole text. A top-level array
 * yields its first object element. Objects nested inside an unclosed bracket are never
 * taken for the whole payload.
 */
export function locateJson(text: string): JsonLocation {
  const fenced = [...text.matchAll(JSON_FENCE), ...text.matchAll(ANY_FENCE)].map((match) => match[1] ?? '');
  let truncated = false;

  for (const candidate of [...fenced, text]) {
    const location = scan(candidate);
    if (location.status === 'found') return location;
    if (location.status === 'truncated') truncated = true;
  }

  return truncated ? { status: 'truncated' } : { status: 'absent' };
}

function scan(text: string): JsonLocation {
  for (let start = 0; start < text.length; start++) {
    const char = text[start];
    if (char !== '{' && char !== '[') continue;

    const end = findClosing(text, start);
    // Everything after an unclosed bracket sits inside it.
    if (end === UNCLOSED) return { status: 'truncated' };
    if (end === MISMATCHED) continue;

    const value = asRecord(tryParse(text.slice(start, end + 1)));
    if (value) return { status: 'found', value };
  }

  return { status: 'absent' };
}

const UNCLOSED = -1;
const MISMATCHED = -2;

/** Index of the bracket closing the one at `start`, skipping brackets inside strings. */
function findClosing(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      stack.push(char === '{' ? '}' : ']');
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) return MISMATCHED;
      if (stack.length === 0) return i;
    }
  }

  return UNCLOSED;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function asRecord(value: unknown): JsonRecord | null {
  if (isRecord(value)) return value;
  if (Array.isArray(value)) return value.find(isRecord) ?? null;
  return null;
}
