import { logger } from "./logger";
import { prKey } from "./fingerprint";
import { errorMessage, MonitorError, NotFoundError, toMonitorError } from "./errors";
import type { StateStore } from "./state";
import type {
  ActionEvent,
  CheckRun,
  EventListener,
  GitHubRemote,
  PullRequestRef,
  RequiredAction,
} from "./types";

export type DispatchResult = { ok: true; skipped: boolean } | { ok: false; error: MonitorError };

export function formatCopilotComment(mention: string, failingChecks: readonly CheckRun[]): string {
  const lines = failingChecks.map((check) => `- ${check.name} (${check.conclusion})`);
  return [
    `${mention} The following checks are failing in this PR:`,
    "",
    ...lines,
    "",
    "Please analyze the failing checks and push fixes for them. Focus on test failures, build errors and lint issues.",
  ].join("\n");
}

function describe(action: RequiredAction): string {
  return action.kind === "approve-run" ? `approve run ${action.runId}` : "post Copilot comment";
}

export interface DispatcherOptions {
  copilotMention: string;
  onEvent?: EventListener;
}

/**
 * Performs required actions against the owning server. An action is recorded
 * in the store only after the remote call succeeds, so a failed action is
 * detected again on the next cycle. An action already recorded is skipped.
 */
export class Dispatcher {
  constructor(
    private readonly remotes: ReadonlyMap<string, GitHubRemote>,
    private readonly store: StateStore,
    private readonly options: DispatcherOptions
  ) {}

  async dispatch(ref: PullRequestRef, action: RequiredAction): Promise<DispatchResult> {
    const pr = prKey(ref);
    const target = action.kind === "approve-run" ? String(action.runId) : undefined;
    const remote = this.remotes.get(ref.server);

    if (!remote) {
      const error = new NotFoundError(`No client configured for server '${ref.server}'`);
      this.emit({ type: "action", pr, kind: action.kind, target, outcome: "skipped", error: error.message });
      return { ok: false, error };
    }

    if (this.store.hasAction(ref, action.fingerprint, action.kind, target)) {
      this.emit({ type: "action", pr, kind: action.kind, target, outcome: "skipped" });
      return { ok: true, skipped: true };
    }

    try {
      if (action.kind === "approve-run") {
        await remote.approveWorkflowRun(ref.repository, action.runId);
      } else {
        const body = formatCopilotComment(this.options.copilotMention, action.failingChecks);
        await remote.postComment(ref.repository, ref.number, body);
      }
    } catch (e) {
      const error = toMonitorError(e, `${describe(action)} on ${pr}`);
      this.emit({ type: "action", pr, kind: action.kind, target, outcome: "failed", error: errorMessage(error) });
      return { ok: false, error };
    }

    this.store.recordAction(ref, action.fingerprint, action.kind, target);
    this.emit({ type: "action", pr, kind: action.kind, target, outcome: "success" });
    return { ok: true, skipped: false };
  }

  private emit(event: ActionEvent): void {
    const fields = { pr: event.pr, action: event.kind, target: event.target, outcome: event.outcome };
    if (event.outcome === "success") {
      logger.info(fields, "Action completed");
    } else if (event.error === undefined) {
      logger.debug(fields, "Action already recorded, skipping");
    } else {
      logger.warn({ ...fields, error: event.error }, "Action not completed");
    }
    this.options.onEvent?.(event);
  }
}
