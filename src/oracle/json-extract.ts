/**
 * Pull a JSON value out of an LLM completion: bare JSON first, then a
 * fenced block, then the first balanced object or array in the text.
 * Returns undefined when nothing parses.
 */
export function extractJson(raw: string): unknown {
  const direct = tryParse(raw.trim());
  if (direct !== undefined) return direct;

  const fenced = raw.match(/```(?:json)?\s*\n([\s\S]*?)```/);
  if (fenced) {
    const block = tryParse(fenced[1].trim());
    if (block !== undefined) return block;
  }

  return parseBalanced(raw);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseBalanced(raw: string): unknown {
  const objectAt = raw.indexOf('{');
  const arrayAt = raw.indexOf('[');
  const begin = objectAt === -1 ? arrayAt : arrayAt === -1 ? objectAt : Math.min(objectAt, arrayAt);
  if (begin === -1) return undefined;

  const open = raw[begin];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = begin; i < raw.length; i++) {
    const ch = raw[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return tryParse(raw.substring(begin, i + 1));
    }
  }
  return undefined;
}
