import { SelectionStore } from "@meetgrid/shared";

export type SessionMode = "per-session" | "shared";

export const SHARED_SESSION_ID = "default";

export type SessionStoresOptions = {
  /** Most keyed stores kept at once; the least recently used goes first. */
  maxSessions?: number;
  /** Stores untouched for this long are dropped on the next write. */
  idleTtlMs?: number;
  now?: () => number;
  newStore?: () => SelectionStore;
};

type Slot = { store: SelectionStore; touchedAt: number };

/**
 * One SelectionStore per session key. In "shared" mode every caller lands in
 * the same bucket, which is how the app behaved before sessions were keyed.
 * The shared bucket is never evicted.
 */
export class SessionStores {
  // Map order doubles as recency order: a touched key is re-inserted last
  private readonly stores = new Map<string, Slot>();
  private readonly maxSessions: number;
  private readonly idleTtlMs: number;
  private readonly now: () => number;
  private readonly newStore: () => SelectionStore;

  constructor(
    readonly mode: SessionMode,
    opts: SessionStoresOptions = {},
  ) {
    this.maxSessions = opts.maxSessions ?? 1000;
    this.idleTtlMs = opts.idleTtlMs ?? 60 * 60 * 1000;
    this.now = opts.now ?? Date.now;
    this.newStore = opts.newStore ?? (() => new SelectionStore());
  }

  resolveKey(requested?: string): string {
    if (this.mode === "shared" || !requested) return SHARED_SESSION_ID;
    return requested;
  }

  /** Store to mutate; created (and registered) on first use. */
  forSession(sessionId: string): SelectionStore {
    const at = this.now();
    const found = this.touch(sessionId, at);
    if (found) return found;

    this.evict(at);
    const store = this.newStore();
    this.stores.set(sessionId, { store, touchedAt: at });
    return store;
  }

  /** Store to read from. Unknown keys get an empty store that is not kept. */
  readSession(sessionId: string): SelectionStore {
    return this.touch(sessionId, this.now()) ?? this.newStore();
  }

  get size() {
    return this.stores.size;
  }

  private touch(sessionId: string, at: number): SelectionStore | undefined {
    const slot = this.stores.get(sessionId);
    if (!slot) return undefined;
    if (this.expired(sessionId, slot, at)) {
      this.stores.delete(sessionId);
      return undefined;
    }
    this.stores.delete(sessionId);
    this.stores.set(sessionId, { store: slot.store, touchedAt: at });
    return slot.store;
  }

  private expired(sessionId: string, slot: Slot, at: number) {
    return sessionId !== SHARED_SESSION_ID && at - slot.touchedAt >= this.idleTtlMs;
  }

  private evict(at: number) {
    for (const [key, slot] of this.stores) {
      if (this.expired(key, slot, at)) this.stores.delete(key);
    }
    for (const key of this.stores.keys()) {
      if (this.stores.size < this.maxSessions) break;
      if (key !== SHARED_SESSION_ID) this.stores.delete(key);
    }
  }
}
