export interface ServerConfig {
  name: string;
  url: string;
  token: string;
}

export interface RepositoryTarget {
  server: string;
  repository: string; // owner/name
}

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface MonitorSettings {
  pollInterval: number; // seconds
  autoApprove: boolean;
  autoFix: boolean;
  evictionCycles: number;
  maxConcurrent: number;
  requestTimeout: number; // seconds
  copilotMention: string;
  logLevel: LogLevel;
}

export interface AppConfig {
  servers: ServerConfig[];
  targets: RepositoryTarget[];
  settings: MonitorSettings;
}

export interface PullRequestRef {
  server: string;
  repository: string;
  number: number;
}

export interface CheckRun {
  name: string;
  status: string;
  conclusion: string; // "pending" until the run completes
}

export interface WorkflowRun {
  id: number;
  name: string;
  status: string;
}

export interface PullRequestSnapshot {
  readonly ref: PullRequestRef;
  readonly title: string;
  readonly url: string;
  readonly author: string;
  readonly headSha: string;
  readonly isDraft: boolean;
  readonly checkRuns: readonly CheckRun[];
  readonly workflowRuns: readonly WorkflowRun[];
}

export type ActionKind = "approve-run" | "comment-copilot";

export interface ApproveRunAction {
  kind: "approve-run";
  runId: number;
  runName: string;
  fingerprint: string;
}

export interface CommentCopilotAction {
  kind: "comment-copilot";
  failingChecks: CheckRun[];
  fingerprint: string;
}

export type RequiredAction = ApproveRunAction | CommentCopilotAction;

export interface ActionRecord {
  kind: ActionKind;
  fingerprint: string;
  target?: string;
  recordedAt: string;
}

export interface StateEntry {
  ref: PullRequestRef;
  fingerprint: string | null;
  actions: Map<string, ActionRecord>;
  missedCycles: number;
  firstSeen: string;
  lastSeen: string;
}

// Transport surface the core consumes; implemented by GitHubClient.
export interface GitHubRemote {
  fetchOpenPullRequests(repository: string): Promise<PullRequestSnapshot[]>;
  approveWorkflowRun(repository: string, runId: number): Promise<void>;
  postComment(repository: string, prNumber: number, body: string): Promise<void>;
}

export type ActionOutcome = "success" | "failed" | "skipped";

export interface ActionEvent {
  type: "action";
  pr: string;
  kind: ActionKind;
  target?: string;
  outcome: ActionOutcome;
  error?: string;
}

export interface CycleSummary {
  repositories: number;
  repositoriesFailed: number;
  pullRequests: number;
  actionsTaken: number;
  actionsFailed: number;
  errors: number;
  tracked: number;
  evicted: number;
  durationMs: number;
}

export interface CycleEvent extends CycleSummary {
  type: "cycle";
}

export type MonitorEvent = ActionEvent | CycleEvent;

export type EventListener = (event: MonitorEvent) => void;
