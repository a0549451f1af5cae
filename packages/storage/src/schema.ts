/**
 * Schema Management
 *
 * Migrations for the task store. Versions are tracked in PRAGMA user_version.
 */

import type { StorageBackend } from './backend.js';
import type { Migration, MigrationResult } from './types.js';

export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Migration 1: tasks and their history
 */
const migration001: Migration = {
  version: 1,
  description: 'Tasks and task history',
  up: `
CREATE TABLE tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    cluster TEXT NOT NULL DEFAULT 'default',
    flow TEXT NOT NULL DEFAULT 'default',
    queue TEXT NOT NULL,
    priority TEXT NOT NULL CHECK (priority IN ('P0', 'P1', 'P2', 'P3')),
    role TEXT,
    version INTEGER NOT NULL DEFAULT 1 CHECK (version >= 1),
    claimed_by TEXT,
    claimed_at TEXT,
    lease_expires_at TEXT,
    orchestrator_id TEXT,
    attempt_count INTEGER NOT NULL DEFAULT 0,
    rejection_count INTEGER NOT NULL DEFAULT 0,
    max_attempts INTEGER NOT NULL DEFAULT 3,
    checks TEXT NOT NULL DEFAULT '[]',
    check_results TEXT NOT NULL DEFAULT '{}',
    blocked_by TEXT,
    branch TEXT NOT NULL DEFAULT 'main',
    work_branch TEXT,
    pr_reference TEXT,
    needs_rebase INTEGER NOT NULL DEFAULT 0,
    execution_notes TEXT,
    submitted_at TEXT,
    completed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (queue != 'claimed' OR lease_expires_at IS NOT NULL)
);

CREATE INDEX idx_tasks_claim ON tasks(queue, cluster, priority, created_at, id);
CREATE INDEX idx_tasks_claimed_by ON tasks(claimed_by);
CREATE INDEX idx_tasks_orchestrator ON tasks(orchestrator_id);
CREATE INDEX idx_tasks_blocked_by ON tasks(blocked_by);

CREATE TABLE task_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    event TEXT NOT NULL,
    from_queue TEXT,
    to_queue TEXT,
    actor TEXT,
    details TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL
);

CREATE INDEX idx_task_history_task ON task_history(task_id, id);
`,
  down: `
DROP TABLE IF EXISTS task_history;
DROP TABLE IF EXISTS tasks;
`,
};

/**
 * Migration 2: orchestrator registry for heartbeats
 */
const migration002: Migration = {
  version: 2,
  description: 'Orchestrator registry',
  up: `
CREATE TABLE orchestrators (
    id TEXT PRIMARY KEY,
    cluster TEXT NOT NULL,
    machine TEXT NOT NULL,
    registered_at TEXT NOT NULL,
    last_heartbeat TEXT NOT NULL
);
`,
  down: `
DROP TABLE IF EXISTS orchestrators;
`,
};

export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

/**
 * Applies all pending migrations
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate(MIGRATIONS);
}

export function isSchemaUpToDate(backend: StorageBackend): boolean {
  return backend.getSchemaVersion() === CURRENT_SCHEMA_VERSION;
}

export function getPendingMigrations(backend: StorageBackend): Migration[] {
  const currentVersion = backend.getSchemaVersion();
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

/**
 * Drops every table. Test use only.
 */
export function resetSchema(backend: StorageBackend): void {
  for (const migration of [...MIGRATIONS].reverse()) {
    if (migration.down) {
      backend.exec(migration.down);
    }
  }
  backend.setSchemaVersion(0);
}

export const EXPECTED_TABLES = ['tasks', 'task_history', 'orchestrators'] as const;

export function validateSchema(backend: StorageBackend): {
  valid: boolean;
  missingTables: string[];
} {
  const rows = backend.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
  );
  const actualTables = new Set(rows.map((r) => r.name));
  const missingTables = EXPECTED_TABLES.filter((t) => !actualTables.has(t));
  return { valid: missingTables.length === 0, missingTables };
}

export function getTableIndexes(backend: StorageBackend, tableName: string): string[] {
  const rows = backend.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    [tableName]
  );
  return rows.map((r) => r.name);
}
