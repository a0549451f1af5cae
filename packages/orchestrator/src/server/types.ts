/**
 * Services the HTTP routes are built from.
 */

import type { Configuration } from '../config/types.js';
import type { TaskStore } from '../store/task-store.js';
import type { LeaseService } from '../services/lease-service.js';
import type { ReviewService } from '../services/review-service.js';
import type { Scheduler } from '../scheduler/scheduler.js';

export interface ServerServices {
  config: Configuration;
  store: TaskStore;
  leases: LeaseService;
  reviews: ReviewService;
  scheduler: Scheduler;
}
