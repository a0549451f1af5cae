import type { Timestamp } from './timestamp.js';

/**
 * Events recorded in a task's history
 */
export const TaskEvent = {
  CREATED: 'created',
  CLAIMED: 'claimed',
  LEASE_RENEWED: 'lease_renewed',
  RELEASED: 'released',
  SUBMITTED: 'submitted',
  ACCEPTED: 'accepted',
  REJECTED: 'rejected',
  REQUEUED: 'requeued',
  TRANSITIONED: 'transitioned',
  LEASE_EXPIRED: 'lease_expired',
  FAILED: 'failed',
  CHECK_RECORDED: 'check_recorded',
  UNBLOCKED: 'unblocked',
  EFFECT_FAILED: 'effect_failed',
  MERGE_CONFLICT_DETECTED: 'merge_conflict_detected',
  MERGE_RETRIED: 'merge_retried',
  RESULT_APPLY_FAILED: 'result_apply_failed',
  UPDATED: 'updated',
} as const;

export type TaskEvent = (typeof TaskEvent)[keyof typeof TaskEvent];

export interface TaskHistoryEntry {
  id: number;
  taskId: string;
  event: TaskEvent | string;
  fromQueue: string | null;
  toQueue: string | null;
  actor: string | null;
  details: Record<string, unknown>;
  createdAt: Timestamp;
}
