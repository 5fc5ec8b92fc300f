import { Octokit } from "@octokit/rest";
import { z } from "zod";
import { logger } from "./logger";
import { NotFoundError, toMonitorError, TransportError } from "./errors";
import { splitRepository } from "./utils";
import type { CheckRun, GitHubRemote, PullRequestSnapshot, ServerConfig, WorkflowRun } from "./types";

const USER_AGENT = "pr-shepherd/1.0.0";

const OPEN_PULL_REQUESTS_QUERY = `
  query OpenPullRequests($owner: String!, $repo: String!, $first: Int!) {
    repository(owner: $owner, name: $repo) {
      pullRequests(states: OPEN, first: $first, orderBy: { field: UPDATED_AT, direction: DESC }) {
        nodes {
          number
          title
          url
          isDraft
          headRefOid
          author {
            login
          }
          commits(last: 1) {
            nodes {
              commit {
                statusCheckRollup {
                  contexts(first: 100) {
                    nodes {
                      __typename
                      ... on CheckRun {
                        name
                        status
                        conclusion
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
`;

const CheckContextSchema = z.object({
  __typename: z.string(),
  name: z.string().optional(),
  status: z.string().optional(),
  conclusion: z.string().nullable().optional(),
});

const PullRequestNodeSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  url: z.string(),
  isDraft: z.boolean(),
  headRefOid: z.string().min(1),
  author: z.object({ login: z.string() }).nullable(),
  commits: z.object({
    nodes: z.array(
      z.object({
        commit: z.object({
          statusCheckRollup: z
            .object({
              contexts: z.object({ nodes: z.array(CheckContextSchema.nullable()) }),
            })
            .nullable(),
        }),
      })
    ),
  }),
});

export const OpenPullRequestsSchema = z.object({
  repository: z
    .object({
      pullRequests: z.object({ nodes: z.array(PullRequestNodeSchema) }),
    })
    .nullable(),
});

export type PullRequestNode = z.infer<typeof PullRequestNodeSchema>;

export function toCheckRuns(node: PullRequestNode): CheckRun[] {
  const rollup = node.commits.nodes[0]?.commit.statusCheckRollup;
  if (!rollup) return [];

  const checks: CheckRun[] = [];
  for (const context of rollup.contexts.nodes) {
    // StatusContext entries (legacy commit statuses) carry no check name
    if (!context || context.__typename !== "CheckRun" || !context.name) continue;
    const status = (context.status ?? "completed").toLowerCase();
    const conclusion =
      status === "completed" && context.conclusion ? context.conclusion.toLowerCase() : "pending";
    checks.push({ name: context.name, status, conclusion });
  }
  return checks;
}

export interface GitHubClientOptions {
  timeoutMs: number;
  // Replaces the global fetch; used to run the client against an in-process stand-in
  fetch?: typeof fetch;
  pageSize?: number;
}

/**
 * One client per configured server. Snapshots come from a single GraphQL
 * query per repository plus the workflow runs of each PR's head commit.
 */
export class GitHubClient implements GitHubRemote {
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;
  private readonly pageSize: number;

  constructor(readonly server: ServerConfig, options: GitHubClientOptions) {
    const log = logger.child({ server: server.name, component: "github" });
    this.timeoutMs = options.timeoutMs;
    this.pageSize = options.pageSize ?? 100;
    this.octokit = new Octokit({
      auth: server.token,
      baseUrl: server.url.replace(/\/+$/, ""),
      userAgent: USER_AGENT,
      log: {
        debug: (message: string) => log.trace(message),
        info: (message: string) => log.debug(message),
        warn: (message: string) => log.warn(message),
        error: (message: string) => log.debug(message),
      },
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.timeoutMs);
  }

  async fetchOpenPullRequests(repository: string): Promise<PullRequestSnapshot[]> {
    const { owner, repo } = splitRepository(repository);

    let raw: unknown;
    try {
      raw = await this.octokit.graphql<unknown>(OPEN_PULL_REQUESTS_QUERY, {
        owner,
        repo,
        first: this.pageSize,
        request: { signal: this.signal() },
      });
    } catch (e) {
      throw toMonitorError(e, `fetch open PRs for ${this.server.name}:${repository}`);
    }

    const parsed = OpenPullRequestsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError(
        `Malformed pull request data for ${this.server.name}:${repository}: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }
    if (!parsed.data.repository) {
      throw new NotFoundError(`Repository ${repository} not found on ${this.server.name}`);
    }

    const snapshots: PullRequestSnapshot[] = [];
    for (const node of parsed.data.repository.pullRequests.nodes) {
      const workflowRuns = await this.getWorkflowRuns(repository, node.headRefOid);
      snapshots.push(
        Object.freeze({
          ref: Object.freeze({ server: this.server.name, repository, number: node.number }),
          title: node.title,
          url: node.url,
          author: node.author?.login ?? "unknown",
          headSha: node.headRefOid,
          isDraft: node.isDraft,
          checkRuns: Object.freeze(toCheckRuns(node)),
          workflowRuns: Object.freeze(workflowRuns),
        })
      );
    }

    logger.debug({ server: this.server.name, repo: repository, count: snapshots.length }, "Fetched open PRs");
    return snapshots;
  }

  async getWorkflowRuns(repository: string, headSha: string): Promise<WorkflowRun[]> {
    const { owner, repo } = splitRepository(repository);
    try {
      const { data } = await this.octokit.rest.actions.listWorkflowRunsForRepo({
        owner,
        repo,
        head_sha: headSha,
        per_page: 100,
        request: { signal: this.signal() },
      });
      return data.workflow_runs.map((run) => ({
        id: run.id,
        name: run.name ?? `run ${run.id}`,
        status: (run.status ?? "unknown").toLowerCase(),
      }));
    } catch (e) {
      throw toMonitorError(e, `list workflow runs for ${this.server.name}:${repository}@${headSha.slice(0, 7)}`);
    }
  }

  async approveWorkflowRun(repository: string, runId: number): Promise<void> {
    const { owner, repo } = splitRepository(repository);
    try {
      await this.octokit.rest.actions.approveWorkflowRun({
        owner,
        repo,
        run_id: runId,
        request: { signal: this.signal() },
      });
    } catch (e) {
      throw toMonitorError(e, `approve workflow run ${runId} in ${this.server.name}:${repository}`);
    }
    logger.info({ server: this.server.name, repo: repository, runId }, "Approved workflow run");
  }

  async postComment(repository: string, prNumber: number, body: string): Promise<void> {
    const { owner, repo } = splitRepository(repository);
    try {
      await this.octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: prNumber,
        body,
        request: { signal: this.signal() },
      });
    } catch (e) {
      throw toMonitorError(e, `comment on ${this.server.name}:${repository}#${prNumber}`);
    }
    logger.info({ server: this.server.name, repo: repository, pr: prNumber }, "Posted comment");
  }
}

export function createClients(servers: readonly ServerConfig[], timeoutMs: number): Map<string, GitHubClient> {
  return new Map(servers.map((server) => [server.name, new GitHubClient(server, { timeoutMs })]));
}
