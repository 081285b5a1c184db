import type { PersonRecord, TriggerClassification } from './types.js';

/** Case- and whitespace-insensitive form of a title, '' when absent. */
export function normalizeTitle(title: string | null | undefined): string {
  return (title ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Decide whether a record needs an LLM resolution call.
 *
 * - no title on file but the feed has one → extrapolate
 * - both present and different            → arbitrate
 * - anything else                         → no call
 *
 * Total over every input, so it is the only gate in front of the resolver.
 */
export function classifyTrigger(
  record: Pick<PersonRecord, 'title_input' | 'title_new'>,
): TriggerClassification {
  const input = normalizeTitle(record.title_input);
  const candidate = normalizeTitle(record.title_new);

  if (!input && candidate) {
    return { scenario: 'new_title_available', mode: 'extrapolate', requires_resolution: true };
  }
  if (input && candidate && input !== candidate) {
    return { scenario: 'title_collision', mode: 'arbitrate', requires_resolution: true };
  }
  return { scenario: 'no_trigger', mode: null, requires_resolution: false };
}
