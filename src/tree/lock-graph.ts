import { debugLocks } from "../core/debug";

let nextTreeId = 1;

export function getNextTreeId(): number {
  return nextTreeId++;
}

/**
 * A node that takes part in lock propagation.
 *
 * Members with a `lockState` record owners. Members without one are
 * transparent (views forward to their source) or inert (sub-views have no
 * lock children).
 */
export interface LockGraphMember {
  readonly id: number;
  readonly isDisposed: boolean;
  readonly lockState: LockState | null;
  lockChildren(): readonly LockGraphMember[];
  clearCache(): void;
}

type OwnerRef = WeakRef<LockGraphMember>;

/**
 * Owner bookkeeping for one lockable tree.
 */
export class LockState {
  /** Set by a direct lock_() on the owner tree. */
  explicit = false;
  readonly self: OwnerRef;
  private readonly owners = new Map<number, OwnerRef>();
  /** Members this tree's id was propagated into, for release on dispose. */
  readonly descendants = new Map<number, OwnerRef>();

  constructor(member: LockGraphMember) {
    this.self = new WeakRef(member);
  }

  /** Ids of owners that are still alive; dead or disposed entries are pruned. */
  liveOwners(): number[] {
    const live: number[] = [];
    for (const [id, ref] of this.owners) {
      const owner = ref.deref();
      if (owner === undefined || owner.isDisposed) {
        this.owners.delete(id);
      } else {
        live.push(id);
      }
    }
    return live;
  }

  hasLiveOwners(): boolean {
    return this.liveOwners().length > 0;
  }

  addOwner(id: number, ref: OwnerRef): void {
    this.owners.set(id, ref);
  }

  removeOwner(id: number): boolean {
    return this.owners.delete(id);
  }
}

type Held = { id: number; descendants: Map<number, OwnerRef> };

/**
 * Tracks which ancestors hold each tree locked.
 *
 * Locking a tree hands its id to every reachable lock child; each child
 * adds the ids it received and forwards them together with its own id. A
 * tree reached through several paths collects one entry per distinct owner.
 */
class LockGraph {
  private readonly registry = new FinalizationRegistry<Held>((held) => {
    this.release(held.id, held.descendants);
  });

  /** Start tracking a member so its contributions are dropped when collected. */
  track(member: LockGraphMember): void {
    const state = member.lockState;
    if (state === null) return;
    this.registry.register(member, { id: member.id, descendants: state.descendants }, member);
  }

  lock(member: LockGraphMember): void {
    const state = member.lockState;
    if (state === null) return;
    state.explicit = true;
    const incoming = new Map<number, OwnerRef>([[member.id, state.self]]);
    const visited = new Map<number, Set<number>>();
    for (const child of member.lockChildren()) this.propagateLock(child, incoming, visited);
    debugLocks(`lock #${member.id}`);
  }

  private propagateLock(
    node: LockGraphMember,
    incoming: ReadonlyMap<number, OwnerRef>,
    visited: Map<number, Set<number>>,
  ): void {
    const state = node.lockState;
    if (state === null) {
      for (const child of node.lockChildren()) this.propagateLock(child, incoming, visited);
      return;
    }
    if (!markVisited(visited, node.id, incoming.keys())) return;

    for (const [ownerId, ref] of incoming) {
      if (ownerId === node.id) continue;
      state.addOwner(ownerId, ref);
      ref.deref()?.lockState?.descendants.set(node.id, state.self);
    }
    debugLocks(`  #${node.id} <- [${[...incoming.keys()]}]`);
    const next = new Map(incoming);
    next.set(node.id, state.self);
    for (const child of node.lockChildren()) this.propagateLock(child, next, visited);
  }

  unlock(member: LockGraphMember): void {
    const state = member.lockState;
    if (state === null) return;
    state.explicit = false;
    member.clearCache();
    const removed = new Set([member.id]);
    const visited = new Map<number, Set<number>>();
    for (const child of member.lockChildren()) this.propagateUnlock(child, removed, visited);
    state.descendants.clear();
    debugLocks(`unlock #${member.id}`);
  }

  private propagateUnlock(
    node: LockGraphMember,
    removed: ReadonlySet<number>,
    visited: Map<number, Set<number>>,
  ): void {
    const state = node.lockState;
    if (state === null) {
      for (const child of node.lockChildren()) this.propagateUnlock(child, removed, visited);
      return;
    }
    if (!markVisited(visited, node.id, removed.values())) return;

    for (const ownerId of removed) state.removeOwner(ownerId);
    let next = removed;
    if (!state.explicit && !state.hasLiveOwners()) {
      node.clearCache();
      state.descendants.clear();
      next = new Set(removed).add(node.id);
      debugLocks(`  #${node.id} unlocked`);
    }
    for (const child of node.lockChildren()) this.propagateUnlock(child, next, visited);
  }

  /**
   * Drop a member's id from every tree it was propagated into. Runs on
   * dispose() and from the finalization registry; never unlocks anything.
   */
  dispose(member: LockGraphMember): void {
    const state = member.lockState;
    if (state === null) return;
    this.registry.unregister(member);
    this.release(member.id, state.descendants);
  }

  private release(id: number, descendants: Map<number, OwnerRef>): void {
    for (const ref of descendants.values()) {
      ref.deref()?.lockState?.removeOwner(id);
    }
    descendants.clear();
    debugLocks(`release #${id}`);
  }

}

/**
 * Record that `ids` reached `nodeId`. Returns false when every id was
 * already seen there, which stops propagation around cycles.
 */
function markVisited(
  visited: Map<number, Set<number>>,
  nodeId: number,
  ids: Iterable<number>,
): boolean {
  let seen = visited.get(nodeId);
  const isNew = seen === undefined;
  if (seen === undefined) {
    seen = new Set();
    visited.set(nodeId, seen);
  }
  let added = false;
  for (const id of ids) {
    if (!seen.has(id)) {
      seen.add(id);
      added = true;
    }
  }
  return added || isNew;
}

export const lockGraph = new LockGraph();
