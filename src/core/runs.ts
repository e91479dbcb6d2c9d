/**
 * Run bookkeeping in `etl_runs`: one row per load or enrich run.
 */
import { randomUUID } from "node:crypto";
import type { DatabaseBackend } from "../db/backend.js";
import { jsonParam } from "../db/schema.js";

export type RunStage = "load" | "enrich";

export type RunStatus = "running" | "completed" | "failed";

export async function startRun(
  db: DatabaseBackend,
  stage: RunStage,
  now: Date = new Date(),
): Promise<string> {
  const id = randomUUID();
  const ts = now.toISOString();
  await db.execute(
    `INSERT INTO ${db.tables.runs} (id, stage, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)`,
    [id, stage, "running", ts, ts],
  );
  return id;
}

export async function finishRun(
  db: DatabaseBackend,
  id: string,
  status: Exclude<RunStatus, "running">,
  summary: object,
  now: Date = new Date(),
): Promise<void> {
  await db.execute(
    `UPDATE ${db.tables.runs} SET status = ?, summary = ${jsonParam(db.dialect)}, updated_at = ? WHERE id = ?`,
    [status, JSON.stringify(summary), now.toISOString(), id],
  );
}
