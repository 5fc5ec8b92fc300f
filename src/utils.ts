import { setTimeout as delay } from "timers/promises";
import type { RepositoryTarget } from "./types";

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export function isRepositoryName(value: string): boolean {
  return REPOSITORY_PATTERN.test(value);
}

export function splitRepository(repository: string): { owner: string; repo: string } {
  const [owner, repo] = repository.split("/");
  return { owner, repo };
}

export function targetKey(target: RepositoryTarget): string {
  return `${target.server}:${target.repository}`;
}

/**
 * Parses a target string. "server/owner/name" binds a repository to one
 * server; "owner/name" applies it to every server in `servers`.
 * Returns null when the string matches neither form.
 */
export function parseTarget(spec: string, servers: string[]): RepositoryTarget[] | null {
  const parts = spec.trim().split("/");
  if (parts.length === 3) {
    const [server, owner, repo] = parts;
    const repository = `${owner}/${repo}`;
    if (!server || !isRepositoryName(repository)) return null;
    return [{ server, repository }];
  }
  if (parts.length === 2) {
    const repository = parts.join("/");
    if (!isRepositoryName(repository)) return null;
    return servers.map((server) => ({ server, repository }));
  }
  return null;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return value.trim().toLowerCase() === "true";
}

export function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return Number(value);
}

export function splitList(value: string | undefined): string[] {
  return value ? value.split(",").map((s) => s.trim()).filter(Boolean) : [];
}

/**
 * Resolves after `ms`, or early (without throwing) when `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    if (!(e instanceof Error && e.name === "AbortError")) {
      throw e;
    }
  }
}

// Run `worker` over `items`, at most `concurrency` at a time, preserving input order
export async function mapInChunks<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, concurrency);
  const results: R[] = [];
  for (let i = 0; i < items.length; i += size) {
    const chunk = items.slice(i, i + size);
    results.push(...(await Promise.all(chunk.map(worker))));
  }
  return results;
}
