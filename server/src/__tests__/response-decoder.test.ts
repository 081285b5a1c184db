import { describe, it, expect } from 'vitest';
import { decodeTitleResponse } from '../engine/response-decoder.js';

describe('decodeTitleResponse', () => {
  it('accepts a bare title line', () => {
    expect(decodeTitleResponse('VP of Sales')).toEqual({ kind: 'clean_title', title: 'VP of Sales' });
  });

  it('strips labels, quotes, fences and a trailing period', () => {
    expect(decodeTitleResponse('Title: "Head of Data."')).toEqual({ kind: 'clean_title', title: 'Head of Data' });
    expect(decodeTitleResponse('```\nChief   Financial Officer\n```')).toEqual({
      kind: 'clean_title',
      title: 'Chief Financial Officer',
    });
  });

  it('recognizes the review sentinel in any case', () => {
    expect(decodeTitleResponse('REVIEW_MANUAL')).toEqual({ kind: 'review_required' });
    expect(decodeTitleResponse('review_manual.')).toEqual({ kind: 'review_required' });
    expect(decodeTitleResponse('"REVIEW_MANUAL"')).toEqual({ kind: 'review_required' });
  });

  it('decodes JSON replies', () => {
    expect(decodeTitleResponse('{"title": "Staff Engineer"}')).toEqual({ kind: 'clean_title', title: 'Staff Engineer' });
    expect(decodeTitleResponse('{"title": null}')).toEqual({ kind: 'review_required' });
    expect(decodeTitleResponse('{"title": "CTO", "review_required": true}')).toEqual({ kind: 'review_required' });
    expect(decodeTitleResponse("{'title': 'Product Lead',}")).toEqual({ kind: 'clean_title', title: 'Product Lead' });
  });

  it('treats JSON without a title object as a parse error', () => {
    expect(decodeTitleResponse('{"title": 42}')).toEqual({ kind: 'parse_error', reason: 'reply is not a title object' });
    expect(decodeTitleResponse('{not json')).toEqual({ kind: 'parse_error', reason: 'reply is not a title object' });
  });

  it('rejects multi-line prose, long text and text without letters', () => {
    expect(decodeTitleResponse('The title is likely\nSenior Engineer')).toEqual({
      kind: 'parse_error',
      reason: 'reply spans multiple lines',
    });
    expect(decodeTitleResponse('A'.repeat(101))).toEqual({
      kind: 'parse_error',
      reason: 'title longer than 100 characters',
    });
    expect(decodeTitleResponse('12345')).toEqual({ kind: 'parse_error', reason: 'title has no letters' });
    expect(decodeTitleResponse('   ')).toEqual({ kind: 'parse_error', reason: 'empty reply' });
  });
});
