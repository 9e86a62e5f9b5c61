export const PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const ENRICHMENT_STATUSES = ['pending', 'in_progress', 'complete', 'failed'] as const;
export type EnrichmentStatus = (typeof ENRICHMENT_STATUSES)[number];

export type EnrichmentStage = 'classify' | 'estimate' | 'priority' | 'embedding' | 'merge';

export interface StageFailure {
  stage: EnrichmentStage;
  code: string;
  message: string;
}

export interface Task {
  id: string;
  title: string | null;
  description: string;
  category: string | null;
  estimated_minutes: number | null;
  priority: Priority | null;
  enrichment_status: EnrichmentStatus;
  enrichment_version: number;
  /** SHA-256 of the description the stored embedding was computed from */
  source_text_hash: string | null;
  last_enrichment_error: StageFailure[] | null;
  /** When the current (or last) run claimed the task; drives the claim lease */
  enrichment_started_at: Date | null;
  /** Token of the run holding the claim; only that run may merge */
  enrichment_claim: string | null;
  enriched_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateTaskInput {
  title?: string;
  description: string;
}

/**
 * Fields the pipeline writes back in one update together with the status transition.
 * Absent keys are left as they are in the stored record.
 */
export interface EnrichmentPatch {
  category?: string;
  estimated_minutes?: number;
  priority?: Priority;
  source_text_hash?: string;
  enrichment_status: Extract<EnrichmentStatus, 'complete' | 'failed'>;
  last_enrichment_error: StageFailure[] | null;
}

/** A successful claim: the task as claimed and the token the run merges with. */
export interface EnrichmentClaim {
  task: Task;
  token: string;
}

export interface ListTasksOptions {
  status?: EnrichmentStatus;
  limit?: number;
}

export function isPriority(value: unknown): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}
