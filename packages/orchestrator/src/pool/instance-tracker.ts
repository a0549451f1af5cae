/**
 * Instance Tracker
 *
 * Local, advisory record of spawned workers: pid, task, blueprint, start
 * time. The task store stays authoritative; a lost record is recovered by
 * the orphan scan, never the other way round.
 *
 * Records are written through to `<runtimeDir>/instances.json` when a state
 * path is given, so a restarted orchestrator can still reap workers it
 * spawned before.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ClaimIntent, Timestamp } from '@tasklane/core';
import { createTimestamp, errorMessage, isClaimIntent, isValidTimestamp } from '@tasklane/core';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('instance-tracker');

/** Entries kept in the audit log; older ones drop off */
const AUDIT_LOG_LIMIT = 500;

// ============================================================================
// Types
// ============================================================================

export interface AgentInstance {
  pid: number;
  blueprint: string;
  /** Index among the blueprint's max_instances slots */
  slot: number;
  taskId: string;
  /** Identity recorded in the task's claimed_by */
  agent: string;
  intent: ClaimIntent;
  /** Queue the task must still be in for the result to apply */
  expectedQueue: string;
  taskDir: string;
  startedAt: Timestamp;
  /** Consecutive failures applying this worker's result */
  applyFailures: number;
}

export interface InstanceAuditEntry {
  action: 'added' | 'removed';
  pid: number;
  blueprint: string;
  taskId: string;
  at: Timestamp;
}

export interface ProcessProbe {
  isAlive(pid: number): boolean;
}

/**
 * Signal 0 checks existence without delivering anything. EPERM means the
 * process exists but belongs to someone else.
 */
export const systemProcessProbe: ProcessProbe = {
  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EPERM';
    }
  },
};

export interface InstanceTrackerOptions {
  /** Write-through file; omitted keeps records in memory only */
  statePath?: string;
}

function isAgentInstance(value: unknown): value is AgentInstance {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof record.pid === 'number' &&
    typeof record.blueprint === 'string' &&
    typeof record.slot === 'number' &&
    typeof record.taskId === 'string' &&
    typeof record.agent === 'string' &&
    isClaimIntent(record.intent) &&
    typeof record.expectedQueue === 'string' &&
    typeof record.taskDir === 'string' &&
    isValidTimestamp(record.startedAt) &&
    typeof record.applyFailures === 'number'
  );
}

// ============================================================================
// InstanceTracker
// ============================================================================

export class InstanceTracker {
  private readonly instances = new Map<number, AgentInstance>();
  private readonly statePath: string | undefined;
  private readonly audit: InstanceAuditEntry[] = [];

  constructor(options: InstanceTrackerOptions = {}) {
    this.statePath = options.statePath;
    this.load();
  }

  register(instance: AgentInstance): void {
    this.instances.set(instance.pid, instance);
    this.record('added', instance);
    logger.debug(`Tracking pid ${instance.pid} (${instance.blueprint}) for ${instance.taskId}`);
    this.save();
  }

  remove(pid: number): AgentInstance | undefined {
    const instance = this.instances.get(pid);
    if (instance) {
      this.instances.delete(pid);
      this.record('removed', instance);
      this.save();
    }
    return instance;
  }

  update(pid: number, changes: Partial<Pick<AgentInstance, 'applyFailures'>>): AgentInstance | undefined {
    const instance = this.instances.get(pid);
    if (!instance) return undefined;
    const updated = { ...instance, ...changes };
    this.instances.set(pid, updated);
    this.save();
    return updated;
  }

  get(pid: number): AgentInstance | undefined {
    return this.instances.get(pid);
  }

  list(): AgentInstance[] {
    return [...this.instances.values()];
  }

  forBlueprint(blueprint: string): AgentInstance[] {
    return this.list().filter((instance) => instance.blueprint === blueprint);
  }

  forSlot(blueprint: string, slot: number): AgentInstance | undefined {
    return this.list().find((instance) => instance.blueprint === blueprint && instance.slot === slot);
  }

  forTask(taskId: string): AgentInstance | undefined {
    return this.list().find((instance) => instance.taskId === taskId);
  }

  count(blueprint?: string): number {
    return blueprint === undefined ? this.instances.size : this.forBlueprint(blueprint).length;
  }

  /** Adds and removals since this tracker was created, oldest first */
  auditLog(): InstanceAuditEntry[] {
    return [...this.audit];
  }

  private record(action: InstanceAuditEntry['action'], instance: AgentInstance): void {
    this.audit.push({ action, pid: instance.pid, blueprint: instance.blueprint, taskId: instance.taskId, at: createTimestamp() });
    if (this.audit.length > AUDIT_LOG_LIMIT) {
      this.audit.splice(0, this.audit.length - AUDIT_LOG_LIMIT);
    }
  }

  private load(): void {
    if (this.statePath === undefined || !fs.existsSync(this.statePath)) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.statePath, 'utf8'));
    } catch (error) {
      logger.warn(`Ignoring unreadable instance state ${this.statePath}: ${errorMessage(error)}`);
      return;
    }
    if (!Array.isArray(parsed)) return;
    for (const entry of parsed) {
      if (isAgentInstance(entry)) {
        this.instances.set(entry.pid, entry);
      }
    }
    logger.info(`Restored ${this.instances.size} tracked instance(s) from ${this.statePath}`);
  }

  private save(): void {
    if (this.statePath === undefined) {
      return;
    }
    fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
    const tmp = `${this.statePath}.tmp`;
    fs.writeFileSync(tmp, `${JSON.stringify(this.list(), null, 2)}\n`);
    fs.renameSync(tmp, this.statePath);
  }
}
