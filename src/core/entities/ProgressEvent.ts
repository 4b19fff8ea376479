import type { JobStatus } from './BuildJob.js';

export type ProgressEventKind = 'progress' | 'status' | 'error';

/**
 * Ephemeral job event. Streamed to subscribers, never persisted.
 */
export interface ProgressEvent {
  jobId: string;
  kind: ProgressEventKind;
  progress?: number;
  status?: JobStatus;
  message?: string;
  timestamp: Date;
}

/**
 * Shape pushed over the progress WebSocket
 */
export interface ProgressMessage {
  data: {
    type: ProgressEventKind;
    progress?: number;
    status?: JobStatus;
    message?: string;
  };
}

export function toProgressMessage(event: ProgressEvent): ProgressMessage {
  return {
    data: {
      type: event.kind,
      progress: event.progress,
      status: event.status,
      message: event.message,
    },
  };
}
