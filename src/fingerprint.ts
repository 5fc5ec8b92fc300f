import { createHash } from "crypto";
import type { PullRequestRef, PullRequestSnapshot } from "./types";

export function prKey(ref: PullRequestRef): string {
  return `${ref.server}:${ref.repository}#${ref.number}`;
}

/**
 * Order-independent digest of the state that drives actions: head commit,
 * check conclusions and workflow run statuses. Titles, authors and URLs do
 * not contribute.
 */
export function computeFingerprint(snapshot: PullRequestSnapshot): string {
  const checks = snapshot.checkRuns.map((c) => `${c.name}\u0000${c.conclusion}`).sort();
  const runs = snapshot.workflowRuns.map((r) => `${r.id}\u0000${r.status}`).sort();

  const canonical = JSON.stringify({ head: snapshot.headSha, checks, runs });
  return createHash("sha256").update(canonical).digest("hex");
}
