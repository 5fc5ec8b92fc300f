import { describe, it, expect } from "vitest";
import { actionKey, StateStore } from "../state";
import type { PullRequestRef } from "../types";

const ref = (number: number, repository = "acme/app", server = "public"): PullRequestRef => ({
  server,
  repository,
  number,
});

describe("StateStore", () => {
  it("starts empty", () => {
    const store = new StateStore();
    expect(store.size).toBe(0);
    expect(store.get(ref(1))).toBeUndefined();
  });

  it("creates an entry on first fingerprint update", () => {
    const store = new StateStore();
    store.updateFingerprint(ref(1), "fp-1");

    const entry = store.get(ref(1));
    expect(entry?.fingerprint).toBe("fp-1");
    expect(entry?.missedCycles).toBe(0);
    expect(entry?.actions.size).toBe(0);
  });

  it("records an action only once", () => {
    const store = new StateStore();
    store.recordAction(ref(1), "fp-1", "comment-copilot");
    store.recordAction(ref(1), "fp-1", "comment-copilot");

    expect(store.get(ref(1))?.actions.size).toBe(1);
    expect(store.hasAction(ref(1), "fp-1", "comment-copilot")).toBe(true);
    expect(store.hasAction(ref(1), "fp-2", "comment-copilot")).toBe(false);
  });

  it("keeps approvals for different runs apart", () => {
    const store = new StateStore();
    store.recordAction(ref(1), "fp-1", "approve-run", "10");

    expect(store.hasAction(ref(1), "fp-1", "approve-run", "10")).toBe(true);
    expect(store.hasAction(ref(1), "fp-1", "approve-run", "11")).toBe(false);
    expect(store.get(ref(1))?.actions.get(actionKey("approve-run", "fp-1", "10"))?.target).toBe("10");
  });

  it("leaves the fingerprint unset when only an action is recorded", () => {
    const store = new StateStore();
    store.recordAction(ref(1), "fp-1", "approve-run", "10");
    expect(store.get(ref(1))?.fingerprint).toBeNull();
  });

  it("separates the same PR number on different servers", () => {
    const store = new StateStore();
    store.updateFingerprint(ref(1, "acme/app", "public"), "a");
    store.updateFingerprint(ref(1, "acme/app", "enterprise"), "b");

    expect(store.size).toBe(2);
    expect(store.stats().byServer).toEqual({ public: 1, enterprise: 1 });
  });

  describe("evictStale", () => {
    it("evicts a PR missing from a single cycle by default", () => {
      const store = new StateStore();
      store.updateFingerprint(ref(4), "fp");

      const evicted = store.evictStale(new Set());
      expect(evicted).toEqual([ref(4)]);
      expect(store.has(ref(4))).toBe(false);
    });

    it("waits for the configured number of consecutive misses", () => {
      const store = new StateStore(3);
      store.updateFingerprint(ref(4), "fp");

      expect(store.evictStale(new Set())).toEqual([]);
      expect(store.evictStale(new Set())).toEqual([]);
      expect(store.has(ref(4))).toBe(true);
      expect(store.evictStale(new Set())).toEqual([ref(4)]);
      expect(store.has(ref(4))).toBe(false);
    });

    it("resets the miss count when the PR is seen again", () => {
      const store = new StateStore(2);
      store.updateFingerprint(ref(4), "fp");

      store.evictStale(new Set());
      store.evictStale(new Set(["public:acme/app#4"]));
      store.evictStale(new Set());

      expect(store.has(ref(4))).toBe(true);
      expect(store.get(ref(4))?.missedCycles).toBe(1);
    });

    it("retains PRs of protected targets", () => {
      const store = new StateStore();
      store.updateFingerprint(ref(1, "acme/app"), "fp");
      store.updateFingerprint(ref(2, "acme/lib"), "fp");

      const evicted = store.evictStale(new Set(), new Set(["public:acme/app"]));

      expect(evicted).toEqual([ref(2, "acme/lib")]);
      expect(store.has(ref(1, "acme/app"))).toBe(true);
      expect(store.get(ref(1, "acme/app"))?.missedCycles).toBe(0);
    });

    it("does not evict a PR whose pipeline is in flight", () => {
      const store = new StateStore();
      store.updateFingerprint(ref(1), "fp");
      store.tryAcquire(ref(1));

      expect(store.evictStale(new Set())).toEqual([]);
      store.release(ref(1));
      expect(store.evictStale(new Set())).toEqual([ref(1)]);
    });
  });

  it("allows one pipeline per PR at a time", () => {
    const store = new StateStore();
    expect(store.tryAcquire(ref(1))).toBe(true);
    expect(store.tryAcquire(ref(1))).toBe(false);
    expect(store.tryAcquire(ref(2))).toBe(true);
    store.release(ref(1));
    expect(store.tryAcquire(ref(1))).toBe(true);
  });

  it("evicts a single entry on request", () => {
    const store = new StateStore();
    store.updateFingerprint(ref(1), "fp");
    expect(store.evict(ref(1))).toBe(true);
    expect(store.evict(ref(1))).toBe(false);
  });

  it("rejects an eviction threshold below 1", () => {
    expect(() => new StateStore(0)).toThrow(RangeError);
  });

  it("counts recorded actions in stats", () => {
    const store = new StateStore();
    store.recordAction(ref(1), "fp", "approve-run", "1");
    store.recordAction(ref(1), "fp", "comment-copilot");
    store.recordAction(ref(2), "fp", "comment-copilot");

    expect(store.stats()).toEqual({ tracked: 2, byServer: { public: 2 }, actionsRecorded: 3 });
  });
});
