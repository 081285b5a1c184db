import logger from './logger.js';

const MAX_REPAIR_INPUT = 20_000;

/**
 * Best-effort JSON recovery for short LLM replies that may include markdown
 * fences, surrounding prose, trailing commas or single-quoted strings.
 * Returns null when nothing parseable is found.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  // Step 1: Strip markdown fences
  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  // Step 2: Direct parse attempt
  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  if (cleaned.length > MAX_REPAIR_INPUT) {
    logger.warn({ size: cleaned.length }, 'Skipping JSON repair on oversized reply');
    return null;
  }

  // Step 3: Extract the outermost object from surrounding text
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
    const extracted = tryParse(cleaned);
    if (extracted !== undefined) return extracted;
  }

  // Step 4: Trailing commas, then single-quoted keys/values
  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const withoutTrailing = tryParse(noTrailing);
  if (withoutTrailing !== undefined) return withoutTrailing;

  const doubleQuoted = noTrailing.replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
  const requoted = tryParse(doubleQuoted);
  if (requoted !== undefined) return requoted;

  logger.debug({ rawSnippet: text.substring(0, 200) }, 'Failed to repair JSON');
  return null;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate) as unknown;
  } catch {
    return undefined;
  }
}
