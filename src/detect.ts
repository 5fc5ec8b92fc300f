import { computeFingerprint } from "./fingerprint";
import { actionKey } from "./state";
import type { CheckRun, PullRequestSnapshot, RequiredAction, StateEntry } from "./types";

// Runs in these states are held until someone approves them
export const APPROVABLE_STATUSES: ReadonlySet<string> = new Set(["queued", "waiting", "action_required"]);

export const FAILING_CONCLUSION = "failure";

export interface DetectOptions {
  autoApprove: boolean;
  autoFix: boolean;
}

const ALL_RULES: DetectOptions = { autoApprove: true, autoFix: true };

function failingChecks(checkRuns: readonly CheckRun[]): CheckRun[] {
  const seen = new Set<string>();
  const failing: CheckRun[] = [];
  for (const check of checkRuns) {
    if (check.conclusion !== FAILING_CONCLUSION || seen.has(check.name)) continue;
    seen.add(check.name);
    failing.push({ ...check });
  }
  return failing;
}

/**
 * Decides which actions a pull request needs, without taking them.
 *
 * Nothing is returned when the snapshot's fingerprint equals the one stored
 * in `previous`. Otherwise approvals come first (one per held workflow run,
 * in snapshot order), followed by at most one Copilot comment covering every
 * failing check. Actions already recorded for the current fingerprint are
 * not repeated.
 */
export function detect(
  previous: StateEntry | undefined,
  snapshot: PullRequestSnapshot,
  options: DetectOptions = ALL_RULES
): RequiredAction[] {
  const fingerprint = computeFingerprint(snapshot);
  if (previous && previous.fingerprint === fingerprint) {
    return [];
  }

  const done = (key: string): boolean => previous?.actions.has(key) ?? false;
  const actions: RequiredAction[] = [];

  if (options.autoApprove) {
    const approved = new Set<number>();
    for (const run of snapshot.workflowRuns) {
      if (!APPROVABLE_STATUSES.has(run.status) || approved.has(run.id)) continue;
      approved.add(run.id);
      if (done(actionKey("approve-run", fingerprint, String(run.id)))) continue;
      actions.push({ kind: "approve-run", runId: run.id, runName: run.name, fingerprint });
    }
  }

  if (options.autoFix) {
    const failing = failingChecks(snapshot.checkRuns);
    if (failing.length > 0 && !done(actionKey("comment-copilot", fingerprint))) {
      actions.push({ kind: "comment-copilot", failingChecks: failing, fingerprint });
    }
  }

  return actions;
}
