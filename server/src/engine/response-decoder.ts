import { z } from 'zod';
import { repairJSON } from '../lib/json-repair.js';
import { REVIEW_SENTINEL } from './prompts.js';

export type DecodedTitleResponse =
  | { kind: 'clean_title'; title: string }
  | { kind: 'review_required' }
  | { kind: 'parse_error'; reason: string };

const MAX_TITLE_LENGTH = 100;

// Some models answer with a JSON object despite the one-line instruction.
const JsonTitleReplySchema = z.object({
  title: z.string().nullable().optional(),
  review_required: z.boolean().optional(),
}).passthrough();

function isSentinel(value: string): boolean {
  return value.trim().replace(/\.$/, '').toUpperCase() === REVIEW_SENTINEL;
}

function cleanTitle(value: string): DecodedTitleResponse {
  const title = value.replace(/\s+/g, ' ').trim().replace(/\.$/, '').trim();
  if (!title) return { kind: 'parse_error', reason: 'empty title' };
  if (title.length > MAX_TITLE_LENGTH) {
    return { kind: 'parse_error', reason: `title longer than ${MAX_TITLE_LENGTH} characters` };
  }
  if (!/\p{L}/u.test(title)) return { kind: 'parse_error', reason: 'title has no letters' };
  return { kind: 'clean_title', title };
}

function decodeJsonReply(text: string): DecodedTitleResponse {
  const parsed = JsonTitleReplySchema.safeParse(repairJSON(text));
  if (!parsed.success) {
    return { kind: 'parse_error', reason: 'reply is not a title object' };
  }
  const { title, review_required } = parsed.data;
  if (review_required === true || title == null || !title.trim() || isSentinel(title)) {
    return { kind: 'review_required' };
  }
  return cleanTitle(title);
}

/**
 * Decode one raw model reply into a title, a review request, or a parse error.
 *
 * Accepts a bare line ("VP of Sales"), a quoted or labelled line
 * ("Title: VP of Sales"), the review sentinel in any case, or a small JSON
 * object with `title` / `review_required`. Anything else is a parse error.
 */
export function decodeTitleResponse(raw: string): DecodedTitleResponse {
  const text = raw
    .trim()
    .replace(/^```(?:json|text)?\s*\n?/i, '')
    .replace(/\n?```\s*$/, '')
    .trim();
  if (!text) return { kind: 'parse_error', reason: 'empty reply' };

  if (text.startsWith('{')) return decodeJsonReply(text);

  const unlabeled = text
    .replace(/^title\s*:\s*/i, '')
    .replace(/^["'`“”]+|["'`“”]+$/g, '')
    .trim();

  if (isSentinel(unlabeled)) return { kind: 'review_required' };
  if (/[\r\n]/.test(unlabeled)) return { kind: 'parse_error', reason: 'reply spans multiple lines' };

  return cleanTitle(unlabeled);
}
