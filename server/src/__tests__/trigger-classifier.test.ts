import { describe, it, expect } from 'vitest';
import { classifyTrigger, normalizeTitle } from '../engine/trigger-classifier.js';

describe('normalizeTitle', () => {
  it('folds case and collapses whitespace', () => {
    expect(normalizeTitle('  VP   of\tSales ')).toBe('vp of sales');
    expect(normalizeTitle(null)).toBe('');
  });
});

describe('classifyTrigger', () => {
  it('extrapolates when only the feed has a title', () => {
    expect(classifyTrigger({ title_input: null, title_new: 'Director of Ops' })).toEqual({
      scenario: 'new_title_available',
      mode: 'extrapolate',
      requires_resolution: true,
    });
    expect(classifyTrigger({ title_input: '   ', title_new: 'Director' }).scenario).toBe('new_title_available');
  });

  it('arbitrates when both titles are present and differ', () => {
    expect(classifyTrigger({ title_input: 'Sales Manager', title_new: 'Senior Sales Manager' })).toEqual({
      scenario: 'title_collision',
      mode: 'arbitrate',
      requires_resolution: true,
    });
  });

  it('does not trigger when titles differ only by case or spacing', () => {
    expect(classifyTrigger({ title_input: 'CTO', title_new: ' cto ' })).toEqual({
      scenario: 'no_trigger',
      mode: null,
      requires_resolution: false,
    });
  });

  it('does not trigger without a candidate title', () => {
    expect(classifyTrigger({ title_input: 'CTO', title_new: null }).requires_resolution).toBe(false);
    expect(classifyTrigger({ title_input: null, title_new: '' }).requires_resolution).toBe(false);
  });

  it('is total over every combination of empty and present titles', () => {
    const values = [null, '', '  ', 'Engineer', 'engineer', 'Manager'];
    for (const title_input of values) {
      for (const title_new of values) {
        const result = classifyTrigger({ title_input, title_new });
        expect(['new_title_available', 'title_collision', 'no_trigger']).toContain(result.scenario);
        expect(result.requires_resolution).toBe(result.scenario !== 'no_trigger');
      }
    }
  });
});
