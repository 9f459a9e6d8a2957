// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import { CoreError } from "../common/errors.js";
import type {
  Amount,
  Clock,
  EscrowHandle,
  EscrowSettlement,
  Hash,
  Identity,
  LedgerOp,
  LedgerReceipt,
  SettlementOp
} from "../common/types.js";
import type { LedgerAdapter } from "./ledger-adapter.js";

export interface LedgerEscrowEntry {
  handle: EscrowHandle;
  settlement?: EscrowSettlement;
}

export interface LedgerSnapshot {
  escrows: LedgerEscrowEntry[];
  slashes: Array<{ opId: string; receipt: LedgerReceipt }>;
  receipts: LedgerReceipt[];
}

/** Durable backing so escrow handles and op ids outlive the process that issued them. */
export interface LedgerJournal {
  saveLedgerEscrow(entry: LedgerEscrowEntry): void;
  saveLedgerSlash(opId: string, receipt: LedgerReceipt): void;
  appendLedgerReceipt(receipt: LedgerReceipt): void;
  loadLedger(): LedgerSnapshot;
}

export const SLASH_TREASURY = "treasury:slashed";

/**
 * Process-local stand-in for the chain. Balances are net flows derived from
 * receipts and may go negative; the real chain enforces funding. With a
 * journal, state is reloaded on construction and written through on every op.
 */
export class InMemoryLedger implements LedgerAdapter {
  private readonly escrowByTask = new Map<Hash, LedgerEscrowEntry>();
  private readonly escrowByHandle = new Map<string, LedgerEscrowEntry>();
  private readonly slashByOp = new Map<string, LedgerReceipt>();
  private readonly balances = new Map<Identity, Amount>();
  private readonly receipts: LedgerReceipt[] = [];
  private readonly pendingFaults = new Map<LedgerOp, number>();

  constructor(
    private readonly clock: Clock = Date.now,
    private readonly journal?: LedgerJournal
  ) {
    if (journal) this.restore(journal.loadLedger());
  }

  async escrow(taskId: Hash, payer: Identity, amount: Amount): Promise<EscrowHandle> {
    this.maybeFail("escrow");
    const existing = this.escrowByTask.get(taskId);
    if (existing) return { ...existing.handle };
    const handle: EscrowHandle = { handleId: randomUUID(), taskId, payer, amount };
    const entry: LedgerEscrowEntry = { handle };
    this.escrowByTask.set(taskId, entry);
    this.escrowByHandle.set(handle.handleId, entry);
    this.journal?.saveLedgerEscrow(entry);
    this.record({ op: "escrow", amount, from: payer });
    return { ...handle };
  }

  async release(handle: EscrowHandle, to: Identity): Promise<LedgerReceipt> {
    this.maybeFail("release");
    return this.settle(handle, "release", to);
  }

  async refund(handle: EscrowHandle): Promise<LedgerReceipt> {
    this.maybeFail("refund");
    return this.settle(handle, "refund", handle.payer);
  }

  async slash(node: Identity, amount: Amount, opId: string): Promise<LedgerReceipt> {
    this.maybeFail("slash");
    const existing = this.slashByOp.get(opId);
    if (existing) return existing;
    const receipt = this.record({ op: "slash", amount, from: node, to: SLASH_TREASURY });
    this.slashByOp.set(opId, receipt);
    this.journal?.saveLedgerSlash(opId, receipt);
    return receipt;
  }

  /** Makes the next `count` calls of `op` throw a transport error. */
  failNext(op: LedgerOp, count = 1): void {
    this.pendingFaults.set(op, (this.pendingFaults.get(op) ?? 0) + count);
  }

  balanceOf(account: Identity): Amount {
    return this.balances.get(account) ?? 0;
  }

  receiptsFor(op?: LedgerOp): LedgerReceipt[] {
    return this.receipts.filter((r) => op === undefined || r.op === op);
  }

  settlementOf(taskId: Hash): { op: SettlementOp; to: Identity } | undefined {
    const settlement = this.escrowByTask.get(taskId)?.settlement;
    return settlement ? { op: settlement.op, to: settlement.to } : undefined;
  }

  private settle(handle: EscrowHandle, op: SettlementOp, to: Identity): LedgerReceipt {
    const entry = this.escrowByHandle.get(handle.handleId);
    if (!entry) throw new CoreError("not_found", `escrow ${handle.handleId}`);
    if (entry.settlement) {
      if (entry.settlement.op === op && entry.settlement.to === to) {
        return entry.settlement.receipt;
      }
      throw new CoreError("escrow_already_settled", handle.handleId);
    }
    const receipt = this.record({ op, amount: entry.handle.amount, to });
    entry.settlement = { op, to, receipt };
    this.journal?.saveLedgerEscrow(entry);
    return receipt;
  }

  private maybeFail(op: LedgerOp): void {
    const remaining = this.pendingFaults.get(op) ?? 0;
    if (remaining <= 0) return;
    this.pendingFaults.set(op, remaining - 1);
    throw new Error(`ledger_partition: ${op}`);
  }

  private restore(snapshot: LedgerSnapshot): void {
    for (const entry of snapshot.escrows) {
      this.escrowByTask.set(entry.handle.taskId, entry);
      this.escrowByHandle.set(entry.handle.handleId, entry);
    }
    for (const { opId, receipt } of snapshot.slashes) this.slashByOp.set(opId, receipt);
    for (const receipt of snapshot.receipts) this.apply(receipt);
  }

  private record(input: Omit<LedgerReceipt, "receiptId" | "at">): LedgerReceipt {
    const receipt: LedgerReceipt = { receiptId: randomUUID(), at: this.clock(), ...input };
    this.apply(receipt);
    this.journal?.appendLedgerReceipt(receipt);
    return receipt;
  }

  private apply(receipt: LedgerReceipt): void {
    this.receipts.push(receipt);
    const account = receipt.op === "escrow" ? receipt.from : receipt.to;
    if (account === undefined) return;
    const delta = receipt.op === "escrow" ? -receipt.amount : receipt.amount;
    this.balances.set(account, (this.balances.get(account) ?? 0) + delta);
  }
}
