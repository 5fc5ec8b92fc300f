import { logger } from "./logger";
import { prKey } from "./fingerprint";
import type { ActionKind, ActionRecord, PullRequestRef, StateEntry } from "./types";

export function actionKey(kind: ActionKind, fingerprint: string, target?: string): string {
  return target === undefined ? `${kind}@${fingerprint}` : `${kind}:${target}@${fingerprint}`;
}

export interface StateStats {
  tracked: number;
  byServer: Record<string, number>;
  actionsRecorded: number;
}

/**
 * In-memory tracking of every observed pull request, keyed by
 * `server:owner/name#number`. Nothing is persisted: a restart starts empty.
 *
 * All access happens on the event loop, so reads and writes are serialized;
 * `tryAcquire`/`release` additionally keep one detect-and-dispatch pipeline in
 * flight per pull request.
 */
export class StateStore {
  private readonly entries = new Map<string, StateEntry>();
  private readonly inFlight = new Set<string>();

  constructor(private readonly evictionCycles = 1) {
    if (!Number.isInteger(evictionCycles) || evictionCycles < 1) {
      throw new RangeError("evictionCycles must be an integer >= 1");
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(ref: PullRequestRef): StateEntry | undefined {
    return this.entries.get(prKey(ref));
  }

  has(ref: PullRequestRef): boolean {
    return this.entries.has(prKey(ref));
  }

  hasAction(ref: PullRequestRef, fingerprint: string, kind: ActionKind, target?: string): boolean {
    return this.entries.get(prKey(ref))?.actions.has(actionKey(kind, fingerprint, target)) ?? false;
  }

  recordAction(ref: PullRequestRef, fingerprint: string, kind: ActionKind, target?: string): void {
    const entry = this.ensure(ref);
    const key = actionKey(kind, fingerprint, target);
    if (entry.actions.has(key)) return;

    const record: ActionRecord = { kind, fingerprint, recordedAt: new Date().toISOString() };
    if (target !== undefined) record.target = target;
    entry.actions.set(key, record);
  }

  updateFingerprint(ref: PullRequestRef, fingerprint: string): void {
    const entry = this.ensure(ref);
    entry.fingerprint = fingerprint;
    entry.lastSeen = new Date().toISOString();
  }

  evict(ref: PullRequestRef): boolean {
    return this.entries.delete(prKey(ref));
  }

  /**
   * Called once per full cycle with the keys of every pull request fetched in
   * it. Entries missing for `evictionCycles` consecutive cycles are removed.
   * Entries belonging to a target in `protectedTargets` (`server:owner/name`,
   * e.g. a repository whose fetch failed) keep their miss count untouched.
   */
  evictStale(seen: ReadonlySet<string>, protectedTargets: ReadonlySet<string> = new Set()): PullRequestRef[] {
    const evicted: PullRequestRef[] = [];

    for (const [key, entry] of this.entries) {
      if (seen.has(key)) {
        entry.missedCycles = 0;
        continue;
      }
      if (protectedTargets.has(`${entry.ref.server}:${entry.ref.repository}`)) {
        continue;
      }
      if (this.inFlight.has(key)) {
        continue;
      }

      entry.missedCycles++;
      if (entry.missedCycles >= this.evictionCycles) {
        this.entries.delete(key);
        evicted.push(entry.ref);
        logger.debug({ pr: key, missedCycles: entry.missedCycles }, "Evicted stale PR state");
      }
    }

    return evicted;
  }

  tryAcquire(ref: PullRequestRef): boolean {
    const key = prKey(ref);
    if (this.inFlight.has(key)) return false;
    this.inFlight.add(key);
    return true;
  }

  release(ref: PullRequestRef): void {
    this.inFlight.delete(prKey(ref));
  }

  stats(): StateStats {
    const byServer: Record<string, number> = {};
    let actionsRecorded = 0;
    for (const entry of this.entries.values()) {
      byServer[entry.ref.server] = (byServer[entry.ref.server] ?? 0) + 1;
      actionsRecorded += entry.actions.size;
    }
    return { tracked: this.entries.size, byServer, actionsRecorded };
  }

  private ensure(ref: PullRequestRef): StateEntry {
    const key = prKey(ref);
    let entry = this.entries.get(key);
    if (!entry) {
      const now = new Date().toISOString();
      entry = {
        ref: { ...ref },
        fingerprint: null,
        actions: new Map(),
        missedCycles: 0,
        firstSeen: now,
        lastSeen: now,
      };
      this.entries.set(key, entry);
    }
    return entry;
  }
}
