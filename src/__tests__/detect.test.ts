import { describe, it, expect } from "vitest";
import { detect } from "../detect";
import { computeFingerprint } from "../fingerprint";
import { StateStore } from "../state";
import { check, makeSnapshot, run } from "./fixtures";

describe("detect", () => {
  it("approves a run waiting for approval on first sighting", () => {
    const snapshot = makeSnapshot(1, { runs: [run(101, "waiting", "CI")] });

    expect(detect(undefined, snapshot)).toEqual([
      { kind: "approve-run", runId: 101, runName: "CI", fingerprint: computeFingerprint(snapshot) },
    ]);
  });

  it("treats queued and action_required runs as approvable", () => {
    const snapshot = makeSnapshot(1, {
      runs: [run(1, "queued"), run(2, "in_progress"), run(3, "action_required"), run(4, "completed")],
    });

    const ids = detect(undefined, snapshot).map((a) => (a.kind === "approve-run" ? a.runId : null));
    expect(ids).toEqual([1, 3]);
  });

  it("aggregates every failing check into one comment", () => {
    const snapshot = makeSnapshot(2, {
      checks: [check("build", "failure"), check("test", "success"), check("lint", "failure")],
    });

    const actions = detect(undefined, snapshot);
    expect(actions).toHaveLength(1);
    const [action] = actions;
    expect(action.kind).toBe("comment-copilot");
    if (action.kind === "comment-copilot") {
      expect(action.failingChecks.map((c) => c.name)).toEqual(["build", "lint"]);
    }
  });

  it("lists a failing check name once even when reported twice", () => {
    const snapshot = makeSnapshot(2, { checks: [check("build", "failure"), check("build", "failure")] });

    const [action] = detect(undefined, snapshot);
    expect(action.kind === "comment-copilot" && action.failingChecks.map((c) => c.name)).toEqual(["build"]);
  });

  it("ignores pending, cancelled and timed out checks", () => {
    const snapshot = makeSnapshot(2, {
      checks: [check("build", "pending"), check("lint", "cancelled"), check("e2e", "timed_out")],
    });
    expect(detect(undefined, snapshot)).toEqual([]);
  });

  it("orders approvals before the comment, each in snapshot order", () => {
    const snapshot = makeSnapshot(3, {
      checks: [check("lint", "failure")],
      runs: [run(20, "queued"), run(10, "waiting")],
    });

    expect(detect(undefined, snapshot).map((a) => (a.kind === "approve-run" ? a.runId : a.kind))).toEqual([
      20,
      10,
      "comment-copilot",
    ]);
  });

  it("returns nothing for a PR without checks or runs", () => {
    expect(detect(undefined, makeSnapshot(4))).toEqual([]);
  });

  it("returns nothing when the fingerprint is unchanged", () => {
    const snapshot = makeSnapshot(1, { checks: [check("build", "failure")], runs: [run(1, "waiting")] });
    const store = new StateStore();
    store.updateFingerprint(snapshot.ref, computeFingerprint(snapshot));

    expect(detect(store.get(snapshot.ref), snapshot)).toEqual([]);
  });

  it("is deterministic for identical input", () => {
    const snapshot = makeSnapshot(1, { checks: [check("build", "failure")], runs: [run(1, "waiting")] });
    expect(JSON.stringify(detect(undefined, snapshot))).toBe(JSON.stringify(detect(undefined, snapshot)));
  });

  it("returns nothing once the detected actions are recorded", () => {
    const snapshot = makeSnapshot(1, { checks: [check("build", "failure")], runs: [run(1, "waiting")] });
    const store = new StateStore();
    const fingerprint = computeFingerprint(snapshot);

    for (const action of detect(undefined, snapshot)) {
      store.recordAction(
        snapshot.ref,
        action.fingerprint,
        action.kind,
        action.kind === "approve-run" ? String(action.runId) : undefined
      );
    }
    store.updateFingerprint(snapshot.ref, fingerprint);

    expect(detect(store.get(snapshot.ref), snapshot)).toEqual([]);
  });

  it("skips actions recorded for the current fingerprint when the stored one differs", () => {
    const snapshot = makeSnapshot(1, { checks: [check("build", "failure")], runs: [run(7, "waiting")] });
    const fingerprint = computeFingerprint(snapshot);
    const store = new StateStore();
    store.updateFingerprint(snapshot.ref, "older");
    store.recordAction(snapshot.ref, fingerprint, "approve-run", "7");

    const actions = detect(store.get(snapshot.ref), snapshot);
    expect(actions.map((a) => a.kind)).toEqual(["comment-copilot"]);
  });

  it("comments again after the set of failing checks grows", () => {
    const first = makeSnapshot(3, { checks: [check("build", "failure"), check("lint", "success")] });
    const second = makeSnapshot(3, { checks: [check("build", "failure"), check("lint", "failure")] });
    const store = new StateStore();

    const [firstAction] = detect(undefined, first);
    store.recordAction(first.ref, firstAction.fingerprint, "comment-copilot");
    store.updateFingerprint(first.ref, computeFingerprint(first));

    const actions = detect(store.get(second.ref), second);
    expect(actions).toHaveLength(1);
    const [action] = actions;
    expect(action.kind === "comment-copilot" && action.failingChecks.map((c) => c.name)).toEqual([
      "build",
      "lint",
    ]);
  });

  it("honours the auto-approve and auto-fix switches", () => {
    const snapshot = makeSnapshot(1, { checks: [check("build", "failure")], runs: [run(1, "waiting")] });

    expect(detect(undefined, snapshot, { autoApprove: false, autoFix: true }).map((a) => a.kind)).toEqual([
      "comment-copilot",
    ]);
    expect(detect(undefined, snapshot, { autoApprove: true, autoFix: false }).map((a) => a.kind)).toEqual([
      "approve-run",
    ]);
    expect(detect(undefined, snapshot, { autoApprove: false, autoFix: false })).toEqual([]);
  });
});
