/**
 * Title Resolution — Prompts
 *
 * Two scenarios share one system prompt. "extrapolate" fills an empty title
 * from the augmentation feed; "arbitrate" picks between two differing titles.
 * Both ask for a single bare title line or the REVIEW_MANUAL sentinel so the
 * reply can be decoded without free-form parsing.
 */

import type { PersonRecord, ResolutionMode } from './types.js';

export const REVIEW_SENTINEL = 'REVIEW_MANUAL';

export type PersonContext = Pick<
  PersonRecord,
  'person_id' | 'full_name' | 'title_input' | 'title_new' | 'company_input' | 'company_new' | 'augmentation_status'
>;

export const TITLE_RESOLUTION_SYSTEM_PROMPT = `You reconcile B2B contact data. Given what an internal CRM record and a third-party augmentation feed say about one person, you return that person's current job title in clean, standard business form.

## Rules

- Expand obvious abbreviations only when unambiguous ("Sr." → "Senior", "VP" → "Vice President" is NOT required; keep common forms like "VP of Sales").
- Keep seniority and function; drop company names, locations, emojis, and marketing fluff.
- Never invent a title that neither source supports.
- If the sources describe different roles and you cannot tell which is current, or the input is not a job title at all, answer ${REVIEW_SENTINEL}.

## Output

Reply with exactly one line: the title, or ${REVIEW_SENTINEL}. No quotes, no explanation.`;

function line(label: string, value: string | null | undefined): string {
  return `${label}: ${value && value.trim() ? value.trim() : '(none)'}`;
}

function personBlock(context: PersonContext): string {
  return [
    line('Person', context.full_name),
    line('Company on file', context.company_input),
    line('Company per feed', context.company_new),
    line('Feed match status', context.augmentation_status),
  ].join('\n');
}

/**
 * User message for one resolution call.
 */
export function buildResolutionPrompt(context: PersonContext, mode: ResolutionMode): string {
  if (mode === 'extrapolate') {
    return `The internal record has no job title. The augmentation feed reports one. Normalize the feed's title into a clean current title.

${personBlock(context)}
${line('Title per feed', context.title_new)}

Return the clean title, or ${REVIEW_SENTINEL} if the feed's value is not a usable job title.`;
  }

  return `The internal record and the augmentation feed disagree on this person's job title. Decide which title is current and return it in clean form.

${personBlock(context)}
${line('Title on file', context.title_input)}
${line('Title per feed', context.title_new)}

Prefer the feed's title when it reads as a promotion or a refreshed form of the same role. Return ${REVIEW_SENTINEL} if you cannot tell which is current.`;
}
