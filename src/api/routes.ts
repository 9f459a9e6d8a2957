// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { CoreError, httpStatusFor, isCoreError } from "../common/errors.js";
import { safeTokenEqual } from "../common/crypto-utils.js";
import { log } from "../common/logger.js";
import type { Clock, Identity, TaskStatus } from "../common/types.js";
import type { Core } from "../core.js";
import { InMemoryNonceStore, verifyNonce } from "../security/nonce-verifier.js";
import type { NonceStore } from "../security/nonce-verifier.js";
import { hashRawBody, verifySignedRequest } from "../security/request-signing.js";
import type { SignedHeaders } from "../security/request-signing.js";

export interface CoreRoutesConfig {
  /** Operator routes are disabled while this is empty. */
  operatorToken?: string;
  maxSkewMs?: number;
  nonceTtlMs?: number;
  nonceStore?: NonceStore;
  clock?: Clock;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const capabilityList = z.array(z.string().min(1).max(64)).max(64);

const RegisterFunctionSchema = z.object({
  contentRef: z.string().min(3).max(256),
  dependencies: z.array(z.string().min(3).max(256)).max(128).default([]),
  visibility: z.enum(["public", "private"]).default("public")
});

const RegisterNodeSchema = z.object({
  capabilities: capabilityList.default([])
});

const DepositSchema = z.object({
  amount: z.number().int().positive()
});

const SubmitTaskSchema = z.object({
  functionId: z.string().regex(/^[0-9a-f]{64}$/),
  reward: z.number().int().nonnegative(),
  executionWindowMs: z.number().int().positive().optional(),
  requiredCapabilities: capabilityList.optional(),
  dependsOn: z.array(z.string().regex(/^[0-9a-f]{64}$/)).max(64).optional()
});

const SubmitResultSchema = z.object({
  resultRef: z.string().min(3).max(256),
  proof: z.string().max(65_536)
});

const EventsQuerySchema = z.object({
  offset: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce.number().int().positive().max(1000).default(100)
});

const TaskListQuerySchema = z.object({
  status: z.enum(["pending", "executing", "completed", "failed", "cancelled"]).optional(),
  submitter: z.string().optional()
});

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CoreError("invalid_input", `${issue?.path.join(".") || "body"}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

function header(req: FastifyRequest, name: string): string {
  const value = req.headers[name];
  return typeof value === "string" ? value : "";
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

/**
 * Registers the core's HTTP surface. Mutating routes require a signed
 * request; the signer's key fingerprint becomes the caller identity.
 */
export function registerCoreRoutes(app: FastifyInstance, core: Core, config: CoreRoutesConfig = {}): void {
  const {
    operatorToken = "",
    maxSkewMs = 120_000,
    nonceTtlMs = 300_000,
    nonceStore = new InMemoryNonceStore(),
    clock = Date.now
  } = config;

  // Keep the JSON text as received; signatures cover those bytes.
  const rawBodies = new WeakMap<FastifyRequest["raw"], string>();
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (req, body, done) => {
    const text = body.toString();
    rawBodies.set(req.raw, text);
    if (text.length === 0) {
      done(null, undefined);
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      done(new CoreError("invalid_input", "body is not valid JSON"), undefined);
      return;
    }
    done(null, parsed);
  });

  app.setErrorHandler((err, req, reply) => {
    if (isCoreError(err)) {
      return reply.status(httpStatusFor(err.code)).send({ error: err.code, message: err.message });
    }
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: "bad_request", message: err.message });
    }
    log.error("unhandled route error", { url: req.url, error: String(err) });
    return reply.status(500).send({ error: "internal_error" });
  });

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  async function authenticate(req: FastifyRequest, reply: FastifyReply): Promise<Identity | null> {
    const signed: SignedHeaders = {
      "x-identity-key": header(req, "x-identity-key"),
      "x-timestamp-ms": header(req, "x-timestamp-ms"),
      "x-nonce": header(req, "x-nonce"),
      "x-body-sha256": header(req, "x-body-sha256"),
      "x-signature": header(req, "x-signature")
    };
    const result = verifySignedRequest({
      method: req.method,
      path: req.url.split("?")[0],
      headers: signed,
      maxSkewMs,
      nowMs: clock()
    });
    if (!result.valid || !result.identity || !result.nonce || result.timestampMs === undefined) {
      reply.status(401).send({ error: "invalid_signature", reason: result.reason });
      return null;
    }
    if (hashRawBody(rawBodies.get(req.raw)) !== signed["x-body-sha256"]) {
      reply.status(400).send({ error: "body_hash_mismatch" });
      return null;
    }
    const nonceCheck = await verifyNonce(nonceStore, {
      nonce: result.nonce,
      sourceId: result.identity,
      timestampMs: result.timestampMs,
      maxSkewMs,
      ttlMs: nonceTtlMs,
      nowMs: clock()
    });
    if (!nonceCheck.valid) {
      reply.status(401).send({ error: "invalid_nonce", reason: nonceCheck.reason });
      return null;
    }
    return result.identity;
  }

  /** Signature is optional on reads; when present it must be valid. */
  async function optionalIdentity(req: FastifyRequest, reply: FastifyReply): Promise<Identity | undefined | null> {
    if (!header(req, "x-signature")) return undefined;
    return authenticate(req, reply);
  }

  async function requireOperator(req: FastifyRequest, reply: FastifyReply): Promise<boolean> {
    const token = header(req, "x-operator-token");
    if (operatorToken && token && safeTokenEqual(token, operatorToken)) return true;
    reply.status(403).send({ error: "operator_only" });
    return false;
  }

  // -----------------------------------------------------------------------
  // Health & events
  // -----------------------------------------------------------------------

  app.get("/health", async () => {
    const counts: Record<TaskStatus, number> = { pending: 0, executing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const task of core.scheduler.listTasks()) counts[task.status] += 1;
    return { ok: true, tasks: counts, nodes: core.nodes.listNodes().length, events: core.events.size };
  });

  app.get("/events", async (req) => {
    const { offset, limit } = parse(EventsQuerySchema, req.query);
    const events = core.events.read(offset, limit);
    return { events, nextOffset: offset + events.length };
  });

  // -----------------------------------------------------------------------
  // Function registry
  // -----------------------------------------------------------------------

  app.post("/functions", async (req, reply) => {
    const owner = await authenticate(req, reply);
    if (!owner) return reply;
    const body = parse(RegisterFunctionSchema, req.body);
    const artifact = core.registry.register(body.contentRef, body.dependencies, body.visibility, owner);
    return reply.status(201).send(artifact);
  });

  app.get<{ Params: { id: string } }>("/functions/:id", async (req, reply) => {
    const viewer = await optionalIdentity(req, reply);
    if (viewer === null) return reply;
    return core.registry.get(req.params.id, viewer ?? "");
  });

  app.get<{ Querystring: { owner?: string } }>("/functions", async (req, reply) => {
    const viewer = await optionalIdentity(req, reply);
    if (viewer === null) return reply;
    const owner = req.query.owner;
    if (!owner) throw new CoreError("invalid_input", "owner query parameter is required");
    const artifacts = core.registry
      .listByOwner(owner)
      .filter((artifact) => artifact.visibility === "public" || artifact.owner === viewer);
    return { functions: artifacts };
  });

  // -----------------------------------------------------------------------
  // Node directory
  // -----------------------------------------------------------------------

  app.post("/nodes", async (req, reply) => {
    const address = await authenticate(req, reply);
    if (!address) return reply;
    const body = parse(RegisterNodeSchema, req.body);
    return reply.status(201).send(core.nodes.registerNode(address, body.capabilities));
  });

  app.post<{ Params: { address: string } }>("/nodes/:address/deposit", async (req, reply) => {
    const caller = await authenticate(req, reply);
    if (!caller) return reply;
    if (caller !== req.params.address) {
      throw new CoreError("not_authorized", "nodes deposit only into their own stake");
    }
    const body = parse(DepositSchema, req.body);
    return core.nodes.deposit(req.params.address, body.amount);
  });

  app.get<{ Params: { address: string } }>("/nodes/:address", async (req) => {
    return core.nodes.getNode(req.params.address);
  });

  app.get<{ Params: { address: string } }>("/nodes/:address/assignments", async (req) => {
    const tasks = core.scheduler.listTasks({ status: "executing", node: req.params.address });
    return { tasks };
  });

  app.post<{ Params: { address: string } }>("/nodes/:address/suspend", async (req, reply) => {
    if (!(await requireOperator(req, reply))) return reply;
    return core.nodes.suspend(req.params.address);
  });

  app.post<{ Params: { address: string } }>("/nodes/:address/reinstate", async (req, reply) => {
    if (!(await requireOperator(req, reply))) return reply;
    return core.nodes.reinstate(req.params.address);
  });

  // -----------------------------------------------------------------------
  // Scheduler
  // -----------------------------------------------------------------------

  app.post("/scheduler/assign", async (req, reply) => {
    if (!(await requireOperator(req, reply))) return reply;
    const assignment = core.scheduler.assign();
    return { assignment: assignment ?? null };
  });

  app.post("/scheduler/sweep", async (req, reply) => {
    if (!(await requireOperator(req, reply))) return reply;
    const timedOut = await core.scheduler.sweepTimeouts();
    const settled = await core.scheduler.settlePendingRejections();
    const blocked = await core.scheduler.failBlockedTasks();
    return { timedOut, settled, blocked };
  });

  app.post("/tasks", async (req, reply) => {
    const submitter = await authenticate(req, reply);
    if (!submitter) return reply;
    const body = parse(SubmitTaskSchema, req.body);
    const task = await core.scheduler.submit({ ...body, submitter });
    return reply.status(201).send(task);
  });

  app.get("/tasks", async (req) => {
    const filter = parse(TaskListQuerySchema, req.query);
    return { tasks: core.scheduler.listTasks(filter) };
  });

  app.get<{ Params: { id: string } }>("/tasks/:id", async (req) => {
    return core.scheduler.getTask(req.params.id);
  });

  app.get<{ Params: { id: string } }>("/tasks/:id/verifications", async (req) => {
    core.scheduler.getTask(req.params.id);
    return { verifications: core.aggregator.verificationsFor(req.params.id) };
  });

  app.post<{ Params: { id: string } }>("/tasks/:id/cancel", async (req, reply) => {
    const caller = await authenticate(req, reply);
    if (!caller) return reply;
    return core.scheduler.cancel(req.params.id, caller);
  });

  // -----------------------------------------------------------------------
  // Result aggregator
  // -----------------------------------------------------------------------

  app.post<{ Params: { id: string } }>("/tasks/:id/result", async (req, reply) => {
    const node = await authenticate(req, reply);
    if (!node) return reply;
    const body = parse(SubmitResultSchema, req.body);
    const verification = await core.aggregator.submitResult({
      taskId: req.params.id,
      node,
      resultRef: body.resultRef,
      proof: body.proof
    });
    return { verification, task: core.scheduler.getTask(req.params.id) };
  });
}
