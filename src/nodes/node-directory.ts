// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { CoreError } from "../common/errors.js";
import type { Amount, CapabilityTag, Clock, ComputeNode, Identity } from "../common/types.js";
import { TaskEventLog } from "../events/event-log.js";
import type { CoreStore } from "../db/store.js";

function assertPositiveAmount(amount: Amount): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new CoreError("invalid_input", `amount must be a positive integer, got ${amount}`);
  }
}

function copy(node: ComputeNode): ComputeNode {
  return { ...node, capabilities: [...node.capabilities] };
}

export class NodeDirectory {
  private readonly nodes = new Map<Identity, ComputeNode>();

  constructor(
    private readonly events: TaskEventLog,
    private readonly clock: Clock = Date.now,
    private readonly store?: CoreStore
  ) {}

  /** Re-registration replaces capabilities only; stake and status survive. */
  registerNode(address: Identity, capabilities: CapabilityTag[]): ComputeNode {
    const unique = [...new Set(capabilities)].sort();
    const existing = this.nodes.get(address);
    const node: ComputeNode = existing
      ? { ...existing, capabilities: unique }
      : { address, capabilities: unique, stake: 0, status: "active", registeredAt: this.clock() };
    this.commit(node);
    this.events.append({
      type: "node_registered",
      subjectId: address,
      data: { capabilities: unique.join(","), reregistered: existing !== undefined }
    });
    return copy(node);
  }

  deposit(address: Identity, amount: Amount): ComputeNode {
    assertPositiveAmount(amount);
    const node = this.require(address);
    node.stake += amount;
    if (node.status === "slashed" && node.stake > 0) {
      node.status = "active";
    }
    this.commit(node);
    this.events.append({
      type: "stake_deposited",
      subjectId: address,
      data: { amount, stake: node.stake, status: node.status }
    });
    return copy(node);
  }

  /** Stake never goes below zero; a node drained to zero becomes `slashed`. */
  slash(address: Identity, amount: Amount): ComputeNode {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new CoreError("invalid_input", `slash amount must be a non-negative integer, got ${amount}`);
    }
    const node = this.require(address);
    const applied = Math.min(amount, node.stake);
    node.stake -= applied;
    if (node.stake === 0) {
      node.status = "slashed";
    }
    this.commit(node);
    this.events.append({
      type: "node_slashed",
      subjectId: address,
      data: { amount: applied, stake: node.stake, status: node.status }
    });
    return copy(node);
  }

  suspend(address: Identity): ComputeNode {
    const node = this.require(address);
    if (node.status !== "active") {
      throw new CoreError("invalid_transition", `node ${address} is ${node.status}`);
    }
    return this.setStatus(node, "suspended");
  }

  reinstate(address: Identity): ComputeNode {
    const node = this.require(address);
    if (node.status !== "suspended") {
      throw new CoreError("invalid_transition", `node ${address} is ${node.status}`);
    }
    return this.setStatus(node, node.stake > 0 ? "active" : "slashed");
  }

  /** Addresses of active, staked nodes whose capabilities cover `required`, sorted. */
  eligibleNodes(required: CapabilityTag[]): Set<Identity> {
    return new Set(this.eligible(required).map((node) => node.address));
  }

  /** Eligible nodes ordered by stake descending, then address ascending. */
  rankedCandidates(required: CapabilityTag[], excluded: readonly Identity[] = []): ComputeNode[] {
    return this.eligible(required)
      .filter((node) => !excluded.includes(node.address))
      .sort((a, b) => b.stake - a.stake || (a.address < b.address ? -1 : a.address > b.address ? 1 : 0))
      .map(copy);
  }

  getNode(address: Identity): ComputeNode {
    return copy(this.require(address));
  }

  listNodes(): ComputeNode[] {
    return [...this.nodes.values()].map(copy);
  }

  restore(nodes: ComputeNode[]): void {
    for (const node of nodes) this.nodes.set(node.address, copy(node));
  }

  private eligible(required: CapabilityTag[]): ComputeNode[] {
    const result: ComputeNode[] = [];
    for (const node of this.nodes.values()) {
      if (node.status !== "active" || node.stake <= 0) continue;
      if (!required.every((tag) => node.capabilities.includes(tag))) continue;
      result.push(node);
    }
    return result.sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));
  }

  private setStatus(node: ComputeNode, status: ComputeNode["status"]): ComputeNode {
    const previous = node.status;
    node.status = status;
    this.commit(node);
    this.events.append({
      type: "node_status_changed",
      subjectId: node.address,
      data: { from: previous, to: status }
    });
    return copy(node);
  }

  private require(address: Identity): ComputeNode {
    const node = this.nodes.get(address);
    if (!node) throw new CoreError("unknown_node", address);
    return node;
  }

  private commit(node: ComputeNode): void {
    this.nodes.set(node.address, node);
    this.store?.saveNode(node);
  }
}
