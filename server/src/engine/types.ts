/**
 * Shared types for the title & company reconciliation engine.
 *
 * Records crossing the engine boundary use snake_case fields so they map
 * one-to-one onto the input rows and the two output tables.
 */

import type { TokenUsage } from '../lib/llm-provider.js';

// ─── Input ───────────────────────────────────────────────────────────

export type AugmentationStatus = 'matched' | 'not_matched' | 'pending';

export interface Firmographics {
  industry?: string | null;
  employee_count?: number | null;
  revenue_range?: string | null;
  headquarters_location?: string | null;
}

export interface PersonRecord {
  person_id: string;
  full_name?: string | null;
  title_input: string | null;
  title_new: string | null;
  company_input: string | null;
  company_new: string | null;
  domain_input?: string | null;
  domain_new?: string | null;
  firmographics_input?: Firmographics;
  firmographics_new?: Firmographics;
  augmentation_status: AugmentationStatus;
  /** ISO timestamp of the record's last write; input order breaks ties. */
  updated_at?: string | null;
}

// ─── Classification & resolution ─────────────────────────────────────

export type TriggerScenario = 'new_title_available' | 'title_collision' | 'no_trigger';

export type ResolutionMode = 'extrapolate' | 'arbitrate';

export type TriggerClassification =
  | { scenario: 'new_title_available'; mode: 'extrapolate'; requires_resolution: true }
  | { scenario: 'title_collision'; mode: 'arbitrate'; requires_resolution: true }
  | { scenario: 'no_trigger'; mode: null; requires_resolution: false };

export type ResolutionOutcome =
  | 'clean_title'
  | 'review_required'
  | 'parse_error'
  | 'provider_failure'
  | 'cancelled';

/** Append-only audit value produced once per resolver call. */
export interface ResolutionResult {
  readonly mode: ResolutionMode;
  readonly resolved_title: string | null;
  readonly confidence: number;
  readonly review_required: boolean;
  readonly raw_model_output: string;
  readonly outcome: ResolutionOutcome;
  readonly attempts: number;
  readonly error: string | null;
  readonly usage: TokenUsage;
}

export type ActionFlag = 'update_title' | 'review_title' | 'keep_original';

export interface ActionableRecord extends PersonRecord {
  scenario: TriggerScenario;
  resolved_title: string | null;
  action_flag: ActionFlag;
  resolution: ResolutionResult | null;
  /**
   * Key of the company group the record joins. Before consolidation this is
   * the effective company's own key; completed runs replace it with the
   * group key, `unknown:<person_id>` included.
   */
  company_key: string;
  /** Resolution failed (provider exhausted or cancelled), not merely ambiguous. */
  failed: boolean;
}

// ─── Company MDM ─────────────────────────────────────────────────────

export type MdmDecision = 'true_job_change' | 'company_data_update';

export interface UnifiedFirmographics {
  name: string | null;
  domain: string | null;
  industry: string | null;
  employee_count: number | null;
  revenue_range: string | null;
  headquarters_location: string | null;
}

/** A company name that was linked to more than one domain within a job. */
export interface AggregationConflict {
  name_key: string;
  chosen_key: string;
  discarded_key: string;
  person_id: string;
}

export interface CompanyMdmDecision {
  company_key: string;
  decision: MdmDecision;
  unified_fields: UnifiedFirmographics;
  source_record_count: number;
  person_ids: string[];
  job_change_person_ids: string[];
  review_required: boolean;
  /** Golden record: verified by augmentation and free of conflicts. */
  mdm_flag: boolean;
  conflicts: AggregationConflict[];
}

// ─── Job ─────────────────────────────────────────────────────────────

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface JobRunSnapshot {
  id: string;
  status: JobStatus;
  total: number;
  processed: number;
  failed: number;
  error: string | null;
  cancel_requested: boolean;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  completion_percentage: number;
  processing_time_ms: number | null;
}

export interface JobReport {
  job: JobRunSnapshot;
  records: ActionableRecord[];
  companies: CompanyMdmDecision[];
  usage: TokenUsage;
}

export type AuditAction =
  | 'job_started'
  | 'record_resolved'
  | 'record_failed'
  | 'aggregation_conflict'
  | 'job_completed'
  | 'job_failed';

export interface AuditEvent {
  job_id: string;
  person_id: string | null;
  action: AuditAction;
  details: Record<string, unknown>;
  created_at: string;
}

/**
 * Receives job state as it changes. Durable storage, dashboards and APIs
 * live behind this interface.
 */
export interface JobStatusSink {
  onTransition(snapshot: JobRunSnapshot): void | Promise<void>;
  onProgress(snapshot: JobRunSnapshot): void | Promise<void>;
  onAudit(event: AuditEvent): void | Promise<void>;
  onResults(report: JobReport): void | Promise<void>;
}
