import { describe, it, expect } from 'vitest';
import { parsePersonRows } from '../engine/input.js';

describe('parsePersonRows', () => {
  it('normalizes blanks and status spellings', () => {
    const result = parsePersonRows([
      {
        person_id: 101,
        title_input: '  ',
        title_new: ' Head of Data ',
        company_input: 'Acme Inc.',
        company_new: '',
        augmentation_status: 'Matched',
      },
      { person_id: 'p-2', title_input: 'CTO', title_new: null, company_input: null, company_new: null, augmentation_status: 'NotMatched' },
      { person_id: 'p-3', title_input: 'CTO', title_new: null, company_input: null, company_new: null, augmentation_status: 'not matched' },
      { person_id: 'p-4', title_input: 'CTO', company_input: 'Globex' },
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.records[0]).toMatchObject({
      person_id: '101',
      title_input: null,
      title_new: 'Head of Data',
      company_input: 'Acme Inc.',
      company_new: null,
      augmentation_status: 'matched',
    });
    expect(result.records.map((r) => r.augmentation_status)).toEqual([
      'matched',
      'not_matched',
      'not_matched',
      'pending',
    ]);
    expect(result.records[3].title_new).toBeNull();
  });

  it('keeps firmographics', () => {
    const result = parsePersonRows([
      {
        person_id: 'p-1',
        company_new: 'Acme',
        augmentation_status: 'matched',
        firmographics_new: { industry: 'Software', employee_count: 120, revenue_range: ' ' },
      },
    ]);
    expect(result.ok && result.records[0].firmographics_new).toMatchObject({
      industry: 'Software',
      employee_count: 120,
      revenue_range: null,
    });
  });

  it('rejects duplicate person ids', () => {
    const result = parsePersonRows([
      { person_id: 'p-1', augmentation_status: 'matched' },
      { person_id: 'p-1', augmentation_status: 'matched' },
    ]);
    expect(result).toEqual({
      ok: false,
      issues: ['1.person_id: Duplicate person_id "p-1" (first seen at row 0)'],
    });
  });

  it('rejects unknown statuses and missing ids', () => {
    const result = parsePersonRows([
      { person_id: 'p-1', augmentation_status: 'maybe' },
      { title_input: 'CTO' },
    ]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toHaveLength(2);
    expect(result.issues[0]).toMatch(/^0\.augmentation_status: /);
    expect(result.issues[1]).toMatch(/^1\.person_id: /);
  });

  it('rejects a non-array payload', () => {
    expect(parsePersonRows({ person_id: 'p-1' }).ok).toBe(false);
  });
});
