// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Database from "better-sqlite3";
import { z } from "zod";
import type {
  ComputeNode,
  FunctionArtifact,
  Identity,
  LedgerReceipt,
  Task,
  TaskEvent,
  VerificationRecord
} from "../common/types.js";
import type { LedgerEscrowEntry, LedgerSnapshot } from "../ledger/in-memory-ledger.js";
import type { CoreSnapshot, CoreStore } from "./store.js";

// Row types for query results
interface ArtifactRow {
  id: string;
  owner: string;
  contentRef: string;
  dependenciesJson: string;
  visibility: string;
  createdAt: number;
}

interface NodeRow {
  address: string;
  capabilitiesJson: string;
  stake: number;
  status: string;
  registeredAt: number;
}

interface TaskRow {
  payloadJson: string;
}

interface VerificationRow {
  taskId: string;
  attempt: number;
  node: string;
  verifierKind: string;
  success: number;
  detail: string | null;
  verifiedAt: number;
}

interface EventRow {
  offset: number;
  type: string;
  taskId: string | null;
  subjectId: string;
  at: number;
  dataJson: string;
  prevHash: string;
  hash: string;
}

interface NonceRow {
  submitter: string;
  nonce: number;
}

interface LedgerEscrowRow {
  handleId: string;
  taskId: string;
  payer: string;
  amount: number;
  settlementJson: string | null;
}

interface LedgerSlashRow {
  opId: string;
  receiptJson: string;
}

interface LedgerReceiptRow {
  receiptJson: string;
}

const stringList = z.array(z.string());
const visibilitySchema = z.enum(["public", "private"]);
const nodeStatusSchema = z.enum(["active", "suspended", "slashed"]);
const verifierKindSchema = z.enum(["checksum", "external"]);
const eventTypeSchema = z.enum([
  "function_registered",
  "node_registered",
  "node_status_changed",
  "stake_deposited",
  "node_slashed",
  "task_submitted",
  "task_assigned",
  "task_requeued",
  "task_completed",
  "task_failed",
  "task_cancelled",
  "result_verified"
]);
const eventDataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const failureReasonSchema = z.enum(["attempts_exhausted", "no_eligible_node", "dependency_failed"]);

const receiptSchema = z.object({
  receiptId: z.string(),
  op: z.enum(["escrow", "release", "refund", "slash"]),
  amount: z.number().int(),
  from: z.string().optional(),
  to: z.string().optional(),
  at: z.number()
});

const settlementSchema = z.object({
  op: z.enum(["release", "refund"]),
  to: z.string(),
  receipt: receiptSchema
});

const taskSchema = z.object({
  id: z.string(),
  functionId: z.string(),
  submitter: z.string(),
  nonce: z.number().int(),
  reward: z.number().int(),
  status: z.enum(["pending", "executing", "completed", "failed", "cancelled"]),
  assignedNode: z.string().optional(),
  attempt: z.number().int(),
  submittedAt: z.number(),
  executionWindowMs: z.number().int(),
  deadlineAt: z.number(),
  resultRef: z.string().optional(),
  completedAt: z.number().optional(),
  failureReason: failureReasonSchema.optional(),
  requiredCapabilities: stringList,
  dependsOn: stringList,
  excludedNodes: stringList,
  escrow: z.object({
    handleId: z.string(),
    taskId: z.string(),
    payer: z.string(),
    amount: z.number().int()
  }),
  pendingSettlement: z
    .object({
      node: z.string(),
      attempt: z.number().int(),
      reason: failureReasonSchema,
      slashAmount: z.number().int()
    })
    .optional()
});

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS function_artifacts (
  id TEXT PRIMARY KEY,
  owner TEXT NOT NULL,
  content_ref TEXT NOT NULL,
  dependencies_json TEXT NOT NULL,
  visibility TEXT NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS compute_nodes (
  address TEXT PRIMARY KEY,
  capabilities_json TEXT NOT NULL,
  stake INTEGER NOT NULL,
  status TEXT NOT NULL,
  registered_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  submitted_at INTEGER NOT NULL,
  payload_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS verification_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL,
  attempt INTEGER NOT NULL,
  node TEXT NOT NULL,
  verifier_kind TEXT NOT NULL,
  success INTEGER NOT NULL,
  detail TEXT,
  verified_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS task_events (
  event_offset INTEGER PRIMARY KEY,
  type TEXT NOT NULL,
  task_id TEXT,
  subject_id TEXT NOT NULL,
  at INTEGER NOT NULL,
  data_json TEXT NOT NULL,
  prev_hash TEXT NOT NULL,
  hash TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS submitter_nonces (
  submitter TEXT PRIMARY KEY,
  nonce INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_escrows (
  handle_id TEXT PRIMARY KEY,
  task_id TEXT NOT NULL UNIQUE,
  payer TEXT NOT NULL,
  amount INTEGER NOT NULL,
  settlement_json TEXT
);

CREATE TABLE IF NOT EXISTS ledger_slashes (
  op_id TEXT PRIMARY KEY,
  receipt_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_receipts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  receipt_id TEXT NOT NULL UNIQUE,
  receipt_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_verification_task ON verification_records(task_id);
`;

/** SQLite mirror of core state. Writes are synchronous, so a committed transition is durable on return. */
export class SQLiteCoreStore implements CoreStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  close(): void {
    this.db.close();
  }

  // ── Writes ────────────────────────────────────────────────────

  saveArtifact(artifact: FunctionArtifact): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO function_artifacts (id, owner, content_ref, dependencies_json, visibility, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        artifact.id,
        artifact.owner,
        artifact.contentRef,
        JSON.stringify(artifact.dependencies),
        artifact.visibility,
        artifact.createdAt
      );
  }

  saveNode(node: ComputeNode): void {
    this.db
      .prepare(
        `INSERT INTO compute_nodes (address, capabilities_json, stake, status, registered_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(address) DO UPDATE SET
           capabilities_json = excluded.capabilities_json,
           stake = excluded.stake,
           status = excluded.status`
      )
      .run(node.address, JSON.stringify(node.capabilities), node.stake, node.status, node.registeredAt);
  }

  saveTask(task: Task): void {
    this.db
      .prepare(
        `INSERT INTO tasks (id, status, submitted_at, payload_json)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           status = excluded.status,
           payload_json = excluded.payload_json`
      )
      .run(task.id, task.status, task.submittedAt, JSON.stringify(task));
  }

  appendVerification(record: VerificationRecord): void {
    this.db
      .prepare(
        `INSERT INTO verification_records (task_id, attempt, node, verifier_kind, success, detail, verified_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.taskId,
        record.attempt,
        record.node,
        record.verifierKind,
        record.success ? 1 : 0,
        record.detail ?? null,
        record.verifiedAt
      );
  }

  appendEvent(event: TaskEvent): void {
    this.db
      .prepare(
        `INSERT INTO task_events (event_offset, type, task_id, subject_id, at, data_json, prev_hash, hash)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        event.offset,
        event.type,
        event.taskId ?? null,
        event.subjectId,
        event.at,
        JSON.stringify(event.data),
        event.prevHash,
        event.hash
      );
  }

  saveSubmitterNonce(submitter: Identity, nonce: number): void {
    this.db
      .prepare(
        `INSERT INTO submitter_nonces (submitter, nonce) VALUES (?, ?)
         ON CONFLICT(submitter) DO UPDATE SET nonce = MAX(nonce, excluded.nonce)`
      )
      .run(submitter, nonce);
  }

  saveLedgerEscrow(entry: LedgerEscrowEntry): void {
    this.db
      .prepare(
        `INSERT INTO ledger_escrows (handle_id, task_id, payer, amount, settlement_json)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(handle_id) DO UPDATE SET settlement_json = excluded.settlement_json`
      )
      .run(
        entry.handle.handleId,
        entry.handle.taskId,
        entry.handle.payer,
        entry.handle.amount,
        entry.settlement ? JSON.stringify(entry.settlement) : null
      );
  }

  saveLedgerSlash(opId: string, receipt: LedgerReceipt): void {
    this.db
      .prepare(`INSERT OR IGNORE INTO ledger_slashes (op_id, receipt_json) VALUES (?, ?)`)
      .run(opId, JSON.stringify(receipt));
  }

  appendLedgerReceipt(receipt: LedgerReceipt): void {
    this.db
      .prepare(`INSERT OR IGNORE INTO ledger_receipts (receipt_id, receipt_json) VALUES (?, ?)`)
      .run(receipt.receiptId, JSON.stringify(receipt));
  }

  // ── Rehydration ───────────────────────────────────────────────

  loadLedger(): LedgerSnapshot {
    const escrows = (
      this.db
        .prepare(
          `SELECT handle_id as handleId, task_id as taskId, payer, amount, settlement_json as settlementJson
           FROM ledger_escrows ORDER BY rowid ASC`
        )
        .all() as LedgerEscrowRow[]
    ).map(
      (row): LedgerEscrowEntry => ({
        handle: { handleId: row.handleId, taskId: row.taskId, payer: row.payer, amount: row.amount },
        settlement: row.settlementJson === null ? undefined : settlementSchema.parse(JSON.parse(row.settlementJson))
      })
    );

    const slashes = (
      this.db.prepare(`SELECT op_id as opId, receipt_json as receiptJson FROM ledger_slashes`).all() as LedgerSlashRow[]
    ).map((row) => ({ opId: row.opId, receipt: receiptSchema.parse(JSON.parse(row.receiptJson)) }));

    const receipts = (
      this.db.prepare(`SELECT receipt_json as receiptJson FROM ledger_receipts ORDER BY id ASC`).all() as LedgerReceiptRow[]
    ).map((row): LedgerReceipt => receiptSchema.parse(JSON.parse(row.receiptJson)));

    return { escrows, slashes, receipts };
  }

  load(): CoreSnapshot {
    const artifacts = (
      this.db
        .prepare(
          `SELECT id, owner, content_ref as contentRef, dependencies_json as dependenciesJson,
                  visibility, created_at as createdAt
           FROM function_artifacts ORDER BY created_at ASC, rowid ASC`
        )
        .all() as ArtifactRow[]
    ).map(
      (row): FunctionArtifact => ({
        id: row.id,
        owner: row.owner,
        contentRef: row.contentRef,
        dependencies: stringList.parse(JSON.parse(row.dependenciesJson)),
        visibility: visibilitySchema.parse(row.visibility),
        createdAt: row.createdAt
      })
    );

    const nodes = (
      this.db
        .prepare(
          `SELECT address, capabilities_json as capabilitiesJson, stake, status, registered_at as registeredAt
           FROM compute_nodes ORDER BY address ASC`
        )
        .all() as NodeRow[]
    ).map(
      (row): ComputeNode => ({
        address: row.address,
        capabilities: stringList.parse(JSON.parse(row.capabilitiesJson)),
        stake: row.stake,
        status: nodeStatusSchema.parse(row.status),
        registeredAt: row.registeredAt
      })
    );

    const tasks = (
      this.db.prepare(`SELECT payload_json as payloadJson FROM tasks ORDER BY submitted_at ASC, id ASC`).all() as TaskRow[]
    ).map((row): Task => taskSchema.parse(JSON.parse(row.payloadJson)));

    const verifications = (
      this.db
        .prepare(
          `SELECT task_id as taskId, attempt, node, verifier_kind as verifierKind, success, detail,
                  verified_at as verifiedAt
           FROM verification_records ORDER BY id ASC`
        )
        .all() as VerificationRow[]
    ).map(
      (row): VerificationRecord => ({
        taskId: row.taskId,
        attempt: row.attempt,
        node: row.node,
        verifierKind: verifierKindSchema.parse(row.verifierKind),
        success: row.success === 1,
        detail: row.detail ?? undefined,
        verifiedAt: row.verifiedAt
      })
    );

    const events = (
      this.db
        .prepare(
          `SELECT event_offset as offset, type, task_id as taskId, subject_id as subjectId, at,
                  data_json as dataJson, prev_hash as prevHash, hash
           FROM task_events ORDER BY event_offset ASC`
        )
        .all() as EventRow[]
    ).map(
      (row): TaskEvent => ({
        offset: row.offset,
        type: eventTypeSchema.parse(row.type),
        taskId: row.taskId ?? undefined,
        subjectId: row.subjectId,
        at: row.at,
        data: eventDataSchema.parse(JSON.parse(row.dataJson)),
        prevHash: row.prevHash,
        hash: row.hash
      })
    );

    const submitterNonces = this.db
      .prepare(`SELECT submitter, nonce FROM submitter_nonces ORDER BY submitter ASC`)
      .all() as NonceRow[];

    return { artifacts, nodes, tasks, verifications, events, submitterNonces };
  }
}
