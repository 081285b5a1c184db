import { effectiveCompany } from './company-consolidator.js';
import type {
  ActionableRecord,
  ActionFlag,
  PersonRecord,
  ResolutionResult,
  TriggerClassification,
} from './types.js';

/**
 * Final per-person flag. Unmatched augmentation data is never applied,
 * whatever the resolver said.
 */
export function assignActionFlag(
  record: Pick<PersonRecord, 'augmentation_status'>,
  classification: TriggerClassification,
  resolution: ResolutionResult | null,
): ActionFlag {
  if (record.augmentation_status === 'not_matched') return 'review_title';
  if (!classification.requires_resolution) return 'keep_original';
  if (!resolution || resolution.review_required || resolution.resolved_title === null) {
    return 'review_title';
  }
  return 'update_title';
}

export function buildActionableRecord(
  record: PersonRecord,
  classification: TriggerClassification,
  resolution: ResolutionResult | null,
): ActionableRecord {
  return {
    ...record,
    scenario: classification.scenario,
    resolved_title: resolution ? resolution.resolved_title : record.title_input,
    action_flag: assignActionFlag(record, classification, resolution),
    resolution,
    company_key: effectiveCompany(record).key,
    failed: resolution?.outcome === 'provider_failure' || resolution?.outcome === 'cancelled',
  };
}
