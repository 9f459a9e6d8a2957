// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { CoreError } from "../common/errors.js";
import { isContentAddress, sha256Hex } from "../common/crypto-utils.js";
import type { Clock, ContentAddress, FunctionArtifact, Hash, Identity, Visibility } from "../common/types.js";
import { TaskEventLog } from "../events/event-log.js";
import type { CoreStore } from "../db/store.js";

export function deriveArtifactId(contentRef: ContentAddress): Hash {
  return sha256Hex(`artifact\n${contentRef}`);
}

export class FunctionRegistry {
  private readonly artifacts = new Map<Hash, FunctionArtifact>();
  private readonly byOwner = new Map<Identity, Hash[]>();

  constructor(
    private readonly events: TaskEventLog,
    private readonly clock: Clock = Date.now,
    private readonly store?: CoreStore
  ) {}

  /**
   * Same content from the same owner returns the stored artifact untouched;
   * the same content claimed by a different owner is rejected.
   */
  register(
    contentRef: ContentAddress,
    dependencies: ContentAddress[],
    visibility: Visibility,
    owner: Identity
  ): FunctionArtifact {
    if (!isContentAddress(contentRef)) {
      throw new CoreError("invalid_input", `malformed content address ${contentRef}`);
    }
    const badDependency = dependencies.find((dep) => !isContentAddress(dep));
    if (badDependency !== undefined) {
      throw new CoreError("invalid_input", `malformed dependency ${badDependency}`);
    }
    const id = deriveArtifactId(contentRef);
    const existing = this.artifacts.get(id);
    if (existing) {
      if (existing.owner !== owner) {
        throw new CoreError("duplicate_artifact", id);
      }
      return { ...existing, dependencies: [...existing.dependencies] };
    }

    const artifact: FunctionArtifact = {
      id,
      owner,
      contentRef,
      dependencies: [...dependencies],
      visibility,
      createdAt: this.clock()
    };
    this.insert(artifact);
    this.store?.saveArtifact(artifact);
    this.events.append({
      type: "function_registered",
      subjectId: id,
      data: { owner, contentRef, visibility }
    });
    return { ...artifact, dependencies: [...artifact.dependencies] };
  }

  /** Private artifacts are reported as missing to anyone but their owner when `viewer` is given. */
  get(id: Hash, viewer?: Identity): FunctionArtifact {
    const artifact = this.artifacts.get(id);
    if (!artifact) throw new CoreError("not_found", `function ${id}`);
    if (viewer !== undefined && artifact.visibility === "private" && artifact.owner !== viewer) {
      throw new CoreError("not_found", `function ${id}`);
    }
    return { ...artifact, dependencies: [...artifact.dependencies] };
  }

  has(id: Hash): boolean {
    return this.artifacts.has(id);
  }

  listByOwner(owner: Identity): FunctionArtifact[] {
    return (this.byOwner.get(owner) ?? []).map((id) => this.get(id));
  }

  restore(artifacts: FunctionArtifact[]): void {
    const ordered = [...artifacts].sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
    for (const artifact of ordered) this.insert(artifact);
  }

  private insert(artifact: FunctionArtifact): void {
    this.artifacts.set(artifact.id, artifact);
    const owned = this.byOwner.get(artifact.owner) ?? [];
    owned.push(artifact.id);
    this.byOwner.set(artifact.owner, owned);
  }
}
