import { logger } from "./logger";
import { detect } from "./detect";
import { Dispatcher } from "./dispatch";
import { computeFingerprint, prKey } from "./fingerprint";
import { StateStore } from "./state";
import {
  errorMessage,
  NotFoundError,
  PermissionError,
  RateLimitError,
  toMonitorError,
  type MonitorError,
} from "./errors";
import { mapInChunks, sleep, targetKey } from "./utils";
import type {
  AppConfig,
  CycleSummary,
  EventListener,
  GitHubRemote,
  PullRequestSnapshot,
  RepositoryTarget,
} from "./types";

export type PollPhase = "idle" | "fetching" | "detecting" | "dispatching" | "sleeping";

interface PullRequestOutcome {
  actionsTaken: number;
  actionsFailed: number;
  // Set when the failure should stop the rest of the repository for this cycle
  abortRepository?: MonitorError;
}

interface RepositoryOutcome {
  target: RepositoryTarget;
  fetched: boolean;
  seen: string[];
  actionsTaken: number;
  actionsFailed: number;
  errors: number;
}

export interface PollerOptions {
  onEvent?: EventListener;
  store?: StateStore;
}

/**
 * Drives the fetch → detect → dispatch cycle over every configured
 * repository, then sleeps for the poll interval.
 */
export class Poller {
  readonly store: StateStore;
  private readonly dispatcher: Dispatcher;
  private readonly onEvent?: EventListener;
  private polling = false;
  private currentPhase: PollPhase = "idle";

  constructor(
    private readonly config: AppConfig,
    private readonly remotes: ReadonlyMap<string, GitHubRemote>,
    options: PollerOptions = {}
  ) {
    this.store = options.store ?? new StateStore(config.settings.evictionCycles);
    this.onEvent = options.onEvent;
    this.dispatcher = new Dispatcher(remotes, this.store, {
      copilotMention: config.settings.copilotMention,
      onEvent: options.onEvent,
    });
  }

  get phase(): PollPhase {
    return this.currentPhase;
  }

  private setPhase(phase: PollPhase): void {
    if (this.currentPhase !== phase) {
      logger.trace({ from: this.currentPhase, to: phase }, "Poll phase");
      this.currentPhase = phase;
    }
  }

  private async processPullRequest(snapshot: PullRequestSnapshot): Promise<PullRequestOutcome> {
    const { ref } = snapshot;
    const pr = prKey(ref);
    const outcome: PullRequestOutcome = { actionsTaken: 0, actionsFailed: 0 };

    if (!this.store.tryAcquire(ref)) {
      logger.debug({ pr }, "PR already being processed, skipping");
      return outcome;
    }

    try {
      this.setPhase("detecting");
      const previous = this.store.get(ref);
      const fingerprint = computeFingerprint(snapshot);

      if (previous?.fingerprint === fingerprint) {
        return outcome;
      }

      const actions = detect(previous, snapshot, {
        autoApprove: this.config.settings.autoApprove,
        autoFix: this.config.settings.autoFix,
      });

      logger.info(
        {
          pr,
          title: snapshot.title.slice(0, 50),
          status: previous ? "changed" : "new",
          sha: snapshot.headSha.slice(0, 7),
          actions: actions.map((a) => a.kind),
        },
        previous ? "PR state changed" : "Started monitoring PR"
      );

      this.setPhase("dispatching");
      let allSucceeded = true;
      let pullRequestGone = false;
      for (const action of actions) {
        const result = await this.dispatcher.dispatch(ref, action);
        if (result.ok) {
          if (!result.skipped) outcome.actionsTaken++;
          continue;
        }

        outcome.actionsFailed++;
        const { error } = result;

        if (error instanceof NotFoundError) {
          if (action.kind === "approve-run") {
            // Deleted or already approved; settled for this fingerprint
            this.store.recordAction(ref, fingerprint, action.kind, String(action.runId));
            logger.warn({ pr, run: action.runId, error: error.message }, "Workflow run not found or already approved, skipping");
          } else {
            pullRequestGone = true;
          }
          continue;
        }

        allSucceeded = false;
        if (error instanceof RateLimitError || error instanceof PermissionError) {
          outcome.abortRepository = error;
          return outcome;
        }
      }

      if (pullRequestGone) {
        this.store.evict(ref);
        logger.warn({ pr }, "PR not found, dropped PR state");
        return outcome;
      }

      // Only move the fingerprint forward once every action went through,
      // so failed actions are detected again next cycle
      if (allSucceeded) {
        this.store.updateFingerprint(ref, fingerprint);
      } else {
        logger.warn({ pr }, "Some actions failed, will retry on next poll");
      }
      return outcome;
    } finally {
      this.store.release(ref);
    }
  }

  private async processRepository(target: RepositoryTarget): Promise<RepositoryOutcome> {
    const outcome: RepositoryOutcome = {
      target,
      fetched: false,
      seen: [],
      actionsTaken: 0,
      actionsFailed: 0,
      errors: 0,
    };
    const remote = this.remotes.get(target.server);
    const repo = targetKey(target);

    if (!remote) {
      logger.error({ repo }, "No client for server, skipping repository");
      outcome.errors++;
      return outcome;
    }

    let snapshots: PullRequestSnapshot[];
    try {
      snapshots = await remote.fetchOpenPullRequests(target.repository);
    } catch (e) {
      const error = toMonitorError(e, `fetch ${repo}`);
      outcome.errors++;
      if (error instanceof PermissionError) {
        logger.error({ repo, error: error.message }, "Token lacks permission for repository, skipping");
      } else if (error instanceof RateLimitError) {
        logger.warn(
          { repo, resetAt: error.resetAt?.toISOString(), error: error.message },
          "Rate limited, skipping repository until next cycle"
        );
      } else {
        logger.error({ repo, error: error.message }, "Failed to fetch PRs");
      }
      return outcome;
    }

    outcome.fetched = true;
    outcome.seen = snapshots.map((s) => prKey(s.ref));
    logger.debug({ repo, count: snapshots.length }, "PRs found");

    for (const snapshot of snapshots) {
      let result: PullRequestOutcome;
      try {
        result = await this.processPullRequest(snapshot);
      } catch (e) {
        logger.error({ pr: prKey(snapshot.ref), error: errorMessage(e) }, "Error processing PR");
        outcome.errors++;
        continue;
      }

      outcome.actionsTaken += result.actionsTaken;
      outcome.actionsFailed += result.actionsFailed;

      if (result.abortRepository) {
        outcome.errors++;
        const level = result.abortRepository instanceof PermissionError ? "error" : "warn";
        logger[level](
          { repo, pr: prKey(snapshot.ref), error: result.abortRepository.message },
          "Skipping rest of repository for this cycle"
        );
        break;
      }
    }

    return outcome;
  }

  /**
   * One full pass over every target, followed by stale-state eviction.
   */
  async runCycle(): Promise<CycleSummary> {
    if (this.polling) {
      throw new Error("Poll cycle already in progress");
    }
    this.polling = true;
    const started = Date.now();

    try {
      this.setPhase("fetching");
      const outcomes = await mapInChunks(this.config.targets, this.config.settings.maxConcurrent, (target) =>
        this.processRepository(target)
      );

      const seen = new Set<string>();
      const unreachable = new Set<string>();
      for (const outcome of outcomes) {
        outcome.seen.forEach((key) => seen.add(key));
        if (!outcome.fetched) unreachable.add(targetKey(outcome.target));
      }
      const evicted = this.store.evictStale(seen, unreachable);
      const stats = this.store.stats();

      const summary: CycleSummary = {
        repositories: outcomes.length,
        repositoriesFailed: unreachable.size,
        pullRequests: seen.size,
        actionsTaken: outcomes.reduce((n, o) => n + o.actionsTaken, 0),
        actionsFailed: outcomes.reduce((n, o) => n + o.actionsFailed, 0),
        errors: outcomes.reduce((n, o) => n + o.errors, 0),
        tracked: stats.tracked,
        evicted: evicted.length,
        durationMs: Date.now() - started,
      };

      logger.info(
        { ...summary, byServer: stats.byServer, actionsRecorded: stats.actionsRecorded },
        "Poll cycle complete"
      );
      this.onEvent?.({ type: "cycle", ...summary });
      return summary;
    } finally {
      this.polling = false;
    }
  }

  /**
   * Polls until `signal` aborts. Cancellation is observed between cycles and
   * while sleeping; a cycle in progress always runs to completion.
   */
  async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.settings.pollInterval * 1000;
    logger.info({ interval: `${this.config.settings.pollInterval}s`, targets: this.config.targets.length }, "Starting PR monitoring");

    while (!signal.aborted) {
      try {
        await this.runCycle();
      } catch (e) {
        logger.error({ error: errorMessage(e) }, "Poll error");
      }
      if (signal.aborted) break;

      this.setPhase("sleeping");
      await sleep(intervalMs, signal);
    }

    this.setPhase("idle");
    logger.info("Monitoring stopped");
  }
}
