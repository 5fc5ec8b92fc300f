import { DEFAULT_SETTINGS } from "../config";
import { NotFoundError } from "../errors";
import type {
  AppConfig,
  CheckRun,
  GitHubRemote,
  MonitorSettings,
  PullRequestSnapshot,
  WorkflowRun,
} from "../types";

export function check(name: string, conclusion: string): CheckRun {
  return { name, status: conclusion === "pending" ? "in_progress" : "completed", conclusion };
}

export function run(id: number, status: string, name = `workflow-${id}`): WorkflowRun {
  return { id, name, status };
}

export function makeSnapshot(
  number: number,
  options: {
    checks?: CheckRun[];
    runs?: WorkflowRun[];
    headSha?: string;
    server?: string;
    repository?: string;
    title?: string;
  } = {}
): PullRequestSnapshot {
  return {
    ref: { server: options.server ?? "public", repository: options.repository ?? "acme/app", number },
    title: options.title ?? `PR ${number}`,
    url: `https://github.com/${options.repository ?? "acme/app"}/pull/${number}`,
    author: "octo",
    headSha: options.headSha ?? "abc1234def",
    isDraft: false,
    checkRuns: options.checks ?? [],
    workflowRuns: options.runs ?? [],
  };
}

export function makeConfig(settings: Partial<MonitorSettings> = {}, repositories = ["acme/app"]): AppConfig {
  return {
    servers: [{ name: "public", url: "https://api.github.com", token: "test-token" }],
    targets: repositories.map((repository) => ({ server: "public", repository })),
    settings: { ...DEFAULT_SETTINGS, pollInterval: 1, ...settings },
  };
}

/**
 * In-memory GitHubRemote. Queue errors in `fetchErrors`, `approveErrors` or
 * `commentErrors` to make the next matching call fail. Runs in `missingRuns`
 * fail every approval with NotFoundError.
 */
export class FakeRemote implements GitHubRemote {
  readonly pullRequests = new Map<string, PullRequestSnapshot[]>();
  readonly fetchErrors = new Map<string, Error>();
  readonly approveErrors: Error[] = [];
  readonly commentErrors: Error[] = [];
  readonly missingRuns = new Set<number>();
  readonly approveAttempts: number[] = [];
  readonly fetches: string[] = [];
  readonly approvals: Array<{ repository: string; runId: number }> = [];
  readonly comments: Array<{ repository: string; prNumber: number; body: string }> = [];

  setPullRequests(repository: string, snapshots: PullRequestSnapshot[]): void {
    this.pullRequests.set(repository, snapshots);
  }

  async fetchOpenPullRequests(repository: string): Promise<PullRequestSnapshot[]> {
    this.fetches.push(repository);
    const error = this.fetchErrors.get(repository);
    if (error) {
      this.fetchErrors.delete(repository);
      throw error;
    }
    return this.pullRequests.get(repository) ?? [];
  }

  async approveWorkflowRun(repository: string, runId: number): Promise<void> {
    this.approveAttempts.push(runId);
    if (this.missingRuns.has(runId)) throw new NotFoundError(`run ${runId} not found`);
    const error = this.approveErrors.shift();
    if (error) throw error;
    this.approvals.push({ repository, runId });
  }

  async postComment(repository: string, prNumber: number, body: string): Promise<void> {
    const error = this.commentErrors.shift();
    if (error) throw error;
    this.comments.push({ repository, prNumber, body });
  }
}
