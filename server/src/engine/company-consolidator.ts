/**
 * Company MDM consolidation.
 *
 * Groups a job's person records by normalized company key and emits exactly
 * one decision per group: whether the records show people moving to a new
 * employer (true_job_change) or refreshed data about the same employer
 * (company_data_update), plus the unified firmographics of the group.
 */

import type { Logger } from '../lib/logger.js';
import { normalizeCompanyKey, normalizeCompanyName, normalizeDomain } from './normalizer.js';
import type {
  AggregationConflict,
  CompanyMdmDecision,
  Firmographics,
  PersonRecord,
  UnifiedFirmographics,
} from './types.js';

type ConsolidationInput = Pick<
  PersonRecord,
  | 'person_id'
  | 'company_input'
  | 'company_new'
  | 'domain_input'
  | 'domain_new'
  | 'firmographics_input'
  | 'firmographics_new'
  | 'augmentation_status'
  | 'updated_at'
>;

export interface EffectiveCompany {
  side: 'input' | 'augmentation';
  name: string | null;
  domain: string | null;
  /** Bare hostname when the domain is well-formed. */
  domain_key: string | null;
  /** Name-only key, '' when there is no usable name. */
  name_key: string;
  /** Domain key when present, otherwise name key. */
  key: string;
  firmographics: Firmographics;
}

export interface ConsolidationResult {
  companies: CompanyMdmDecision[];
  conflicts: AggregationConflict[];
}

export interface ConsolidationOptions {
  log?: Logger;
  onConflict?: (conflict: AggregationConflict) => void;
}

const UNKNOWN_PREFIX = 'unknown:';

function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function describeSide(
  side: EffectiveCompany['side'],
  name: string | null | undefined,
  domain: string | null | undefined,
  firmographics: Firmographics | undefined,
): EffectiveCompany {
  const domainKey = normalizeDomain(domain);
  const nameKey = normalizeCompanyKey(name, null);
  return {
    side,
    name: hasText(name) ? name.trim() : null,
    domain: hasText(domain) ? domain.trim() : null,
    domain_key: domainKey,
    name_key: nameKey,
    key: domainKey ?? nameKey,
    firmographics: firmographics ?? {},
  };
}

/** Both sides carry a company name and the names normalize alike. */
function namesSameCompany(record: ConsolidationInput): boolean {
  const name = normalizeCompanyName(record.company_input);
  return name !== '' && name === normalizeCompanyName(record.company_new);
}

/** Company as stated by the internal record. */
export function inputCompany(record: ConsolidationInput): EffectiveCompany {
  return describeSide('input', record.company_input, record.domain_input, record.firmographics_input);
}

/**
 * The company a record should be grouped under. Matched augmentation data
 * wins when it names a company. `domain_input` is only borrowed for the
 * augmentation side when both sides name the same company, so a new
 * employer never inherits the old employer's domain.
 */
export function effectiveCompany(record: ConsolidationInput): EffectiveCompany {
  if (record.augmentation_status !== 'matched' || !hasText(record.company_new)) {
    return inputCompany(record);
  }
  const domain = hasText(record.domain_new)
    ? record.domain_new
    : namesSameCompany(record) ? record.domain_input : null;
  return describeSide('augmentation', record.company_new, domain, record.firmographics_new);
}

function timestampOf(value: string | null | undefined): number {
  if (!value) return Number.NEGATIVE_INFINITY;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Oldest first: missing timestamps sort earliest, equal timestamps put
 * matched records last, input order breaks remaining ties.
 */
export function orderByRecency<T extends Pick<PersonRecord, 'updated_at' | 'augmentation_status'>>(
  records: readonly T[],
): T[] {
  return records
    .map((record, index) => ({ record, index, ts: timestampOf(record.updated_at) }))
    .sort((a, b) => {
      if (a.ts !== b.ts) return a.ts < b.ts ? -1 : 1;
      if (Number.isFinite(a.ts)) {
        const rank = (r: T) => (r.augmentation_status === 'matched' ? 1 : 0);
        const diff = rank(a.record) - rank(b.record);
        if (diff !== 0) return diff;
      }
      return a.index - b.index;
    })
    .map((entry) => entry.record);
}

function emptyUnified(): UnifiedFirmographics {
  return {
    name: null,
    domain: null,
    industry: null,
    employee_count: null,
    revenue_range: null,
    headquarters_location: null,
  };
}

function foldUnified(target: UnifiedFirmographics, company: EffectiveCompany): void {
  if (company.name) target.name = company.name;
  if (company.domain_key) target.domain = company.domain_key;
  const f = company.firmographics;
  if (hasText(f.industry)) target.industry = f.industry.trim();
  if (typeof f.employee_count === 'number' && Number.isFinite(f.employee_count)) {
    target.employee_count = f.employee_count;
  }
  if (hasText(f.revenue_range)) target.revenue_range = f.revenue_range.trim();
  if (hasText(f.headquarters_location)) target.headquarters_location = f.headquarters_location.trim();
}

interface Group {
  key: string;
  firstIndex: number;
  members: Array<{ record: ConsolidationInput; index: number }>;
}

/**
 * Build one CompanyMdmDecision per normalized company group.
 */
export function consolidateCompanies(
  records: readonly ConsolidationInput[],
  options: ConsolidationOptions = {},
): ConsolidationResult {
  const ordered = orderByRecency(records);
  const effective = new Map<ConsolidationInput, EffectiveCompany>();
  for (const record of records) effective.set(record, effectiveCompany(record));

  // ─── Name → domain aliases (latest link wins) ──────────────────────
  const aliases = new Map<string, string>();
  const conflicts: AggregationConflict[] = [];

  const link = (nameKey: string, domainKey: string | null, personId: string) => {
    if (!nameKey || !domainKey || nameKey === domainKey) return;
    const previous = aliases.get(nameKey);
    if (previous && previous !== domainKey) {
      const conflict: AggregationConflict = {
        name_key: nameKey,
        chosen_key: domainKey,
        discarded_key: previous,
        person_id: personId,
      };
      conflicts.push(conflict);
      options.log?.warn(conflict, 'Company name linked to more than one domain; keeping the most recent');
      options.onConflict?.(conflict);
    }
    aliases.set(nameKey, domainKey);
  };

  for (const record of ordered) {
    const company = effective.get(record) ?? effectiveCompany(record);
    link(company.name_key, company.domain_key, record.person_id);
  }

  const resolveKey = (company: EffectiveCompany) =>
    company.domain_key ?? aliases.get(company.name_key) ?? company.name_key;

  // ─── Grouping ──────────────────────────────────────────────────────
  const groups = new Map<string, Group>();
  records.forEach((record, index) => {
    const company = effective.get(record) ?? effectiveCompany(record);
    const resolved = resolveKey(company);
    const key = resolved || `${UNKNOWN_PREFIX}${record.person_id}`;
    const group = groups.get(key) ?? { key, firstIndex: index, members: [] };
    group.members.push({ record, index });
    groups.set(key, group);
  });

  const rank = new Map<ConsolidationInput, number>();
  ordered.forEach((record, position) => rank.set(record, position));

  // ─── Decisions ─────────────────────────────────────────────────────
  const companies: CompanyMdmDecision[] = [];
  for (const group of [...groups.values()].sort((a, b) => a.firstIndex - b.firstIndex)) {
    const unknown = group.key.startsWith(UNKNOWN_PREFIX);
    const jobChangeIds: string[] = [];
    let reviewRequired = unknown;

    for (const { record } of group.members) {
      const inputKey = resolveKey(inputCompany(record));
      if (record.augmentation_status === 'matched') {
        const company = effective.get(record);
        // Same employer name with a new domain is a data refresh, not a move.
        const moved = company?.side === 'augmentation' && !namesSameCompany(record);
        if (moved && inputKey && inputKey !== group.key) {
          jobChangeIds.push(record.person_id);
        }
      } else if (record.augmentation_status === 'not_matched' && hasText(record.company_new)) {
        const candidateKey = resolveKey(
          describeSide('augmentation', record.company_new, record.domain_new, record.firmographics_new),
        );
        if (candidateKey && candidateKey !== inputKey) reviewRequired = true;
      }
    }

    const unified = emptyUnified();
    const byRecency = [...group.members].sort(
      (a, b) => (rank.get(a.record) ?? a.index) - (rank.get(b.record) ?? b.index),
    );
    for (const { record } of byRecency) {
      foldUnified(unified, effective.get(record) ?? effectiveCompany(record));
    }

    const groupConflicts = conflicts.filter((c) => c.chosen_key === group.key);
    const anyMatched = group.members.some((m) => m.record.augmentation_status === 'matched');

    companies.push({
      company_key: group.key,
      decision: jobChangeIds.length > 0 ? 'true_job_change' : 'company_data_update',
      unified_fields: unified,
      source_record_count: group.members.length,
      person_ids: group.members.map((m) => m.record.person_id),
      job_change_person_ids: jobChangeIds,
      review_required: reviewRequired,
      mdm_flag: anyMatched && !reviewRequired && groupConflicts.length === 0,
      conflicts: groupConflicts,
    });
  }

  return { companies, conflicts };
}
