import type { InstallerConfig } from './InstallerConfig.js';

/**
 * Build job domain entity
 */
export type JobStatus =
  | 'pending'
  | 'rendering'
  | 'building'
  | 'complete'
  | 'failed'
  | 'cancelled';

export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'rendering',
  'building',
  'complete',
  'failed',
  'cancelled',
];

export interface BuildJob {
  id: string;
  status: JobStatus;
  progress: number; // 0-100
  statusMessage: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  artifactRef?: string;
  errorDetail?: string;
  config: InstallerConfig;
}

/**
 * Allowed forward transitions. Terminal states have none.
 */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['rendering', 'failed', 'cancelled'],
  rendering: ['building', 'failed', 'cancelled'],
  building: ['complete', 'failed', 'cancelled'],
  complete: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value);
}
