import logger from './logger.js';

type Parsed = { value: unknown } | null;

function tryParse(text: string): Parsed {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

/**
 * Multi-step JSON repair for generation output that may include markdown fences,
 * surrounding prose, or trailing commas. Returns `null` when nothing parses;
 * callers validate the shape separately.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  // Step 1: Strip markdown fences
  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  // Step 2: Direct parse attempt
  let parsed = tryParse(cleaned);
  if (parsed) return parsed.value;

  // Step 3: Extract JSON object/array from surrounding text
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(closeChar);
    if (lastClose > start) {
      cleaned = cleaned.slice(start, lastClose + 1);
      parsed = tryParse(cleaned);
      if (parsed) return parsed.value;
    }
  }

  // Step 4: Fix trailing commas
  const noTrailing = cleaned
    .replace(/,\s*([\]}])/g, '$1');

  parsed = tryParse(noTrailing);
  if (parsed) return parsed.value;

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  // Step 5: unescaped newlines/tabs inside strings, single-quoted values
  const aggressive = noTrailing
    // Fix unescaped control chars inside JSON strings (newlines, tabs)
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    // Single quotes → double quotes (only when used as JSON delimiters)
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');

  parsed = tryParse(aggressive);
  if (parsed) return parsed.value;

  // Step 6: Fix unquoted keys: { key: "value" } → { "key": "value" }
  const quotedKeys = aggressive.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  parsed = tryParse(quotedKeys);
  if (parsed) return parsed.value;

  // Step 7: truncated output: close unclosed braces/brackets
  function closePartial(s: string): string {
    const stack: string[] = [];
    let inString = false;
    let escape = false;
    for (const ch of s) {
      if (escape) { escape = false; continue; }
      if (ch === '\\' && inString) { escape = true; continue; }
      if (ch === '"') { inString = !inString; continue; }
      if (inString) continue;
      if (ch === '{') stack.push('}');
      else if (ch === '[') stack.push(']');
      else if (ch === '}' || ch === ']') stack.pop();
    }
    // Remove trailing comma before we close, then append missing closers
    return s.replace(/,\s*$/, '') + stack.reverse().join('');
  }

  const closed = closePartial(quotedKeys);
  if (closed !== quotedKeys) {
    parsed = tryParse(closed);
    if (parsed) return parsed.value;
  }

  // Step 8: Give up: log raw snippet for debugging
  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
