/**
 * Shared test helpers: in-memory GitHub and Jira stand-ins plus payload factories.
 * Import these in test files to keep setup clean and reproducible.
 */

import { vi } from "vitest"
import { parseConfiguration, type Configuration } from "./configuration"
import { RemoteRejectedError } from "./errors"
import type { CheckRunInput, IssueComment, SourceControl } from "./github-client"
import type { IssueTracker, JiraIssue, JiraTransition } from "./jira-client"
import type { PullRequest } from "./pull-request"

export const TEST_APP_ID = 4242
export const TEST_APP_SLUG = "branch-keeper"
export const BOT_LOGIN = `${TEST_APP_SLUG}[bot]`

// ── Pull request factory ──

interface PullRequestOptions {
  number?: number
  title?: string
  owner?: string
  repo?: string
  base?: string
  headSha?: string
  mergedAt?: string | null
  state?: string
}

export const makePullRequest = (opts: PullRequestOptions = {}): PullRequest => {
  const owner = opts.owner ?? "acme"
  const repo = opts.repo ?? "widget"
  const number = opts.number ?? 1
  return {
    number,
    title: opts.title ?? "Fix build (PROJ-1)",
    state: opts.state ?? "open",
    html_url: `https://github.com/${owner}/${repo}/pull/${number}`,
    merged_at: opts.mergedAt ?? null,
    user: { login: "octocat" },
    head: { sha: opts.headSha ?? "head-sha", ref: "feature" },
    base: { ref: opts.base ?? "master", repo: { name: repo, owner: { login: owner } } },
  }
}

// ── Webhook payload factories ──

export const repositoryPayload = (owner = "acme", repo = "widget") => ({
  name: repo,
  full_name: `${owner}/${repo}`,
  owner: { login: owner },
})

export const pushPayload = (ref: string, owner = "acme", repo = "widget") => ({
  ref,
  before: "0000000",
  after: "1111111",
  repository: repositoryPayload(owner, repo),
})

export const checkSuitePayload = (
  action: string,
  appId: number,
  pullRequests: number[],
  owner = "acme",
  repo = "widget",
) => ({
  action,
  check_suite: {
    id: 7,
    app: { id: appId, slug: TEST_APP_SLUG },
    pull_requests: pullRequests.map((number) => ({ number })),
  },
  repository: repositoryPayload(owner, repo),
})

export const issueCommentPayload = (
  body: string,
  opts: { action?: string; state?: string; isPullRequest?: boolean; number?: number } = {},
) => ({
  action: opts.action ?? "created",
  issue: {
    number: opts.number ?? 1,
    title: "Fix build (PROJ-1)",
    state: opts.state ?? "open",
    ...(opts.isPullRequest === false ? {} : { pull_request: { url: "https://example.test/pr/1" } }),
  },
  comment: { id: 99, body },
  repository: repositoryPayload(),
})

export const pullRequestPayload = (action: string, pr: PullRequest = makePullRequest()) => ({
  action,
  number: pr.number,
  pull_request: pr,
  repository: repositoryPayload(pr.base.repo.owner.login, pr.base.repo.name),
})

// ── Configuration ──

export const makeConfiguration = (yaml?: string): Configuration =>
  parseConfiguration(
    yaml ??
      `
appId: ${TEST_APP_ID}
installationId: 1
repositories:
  - owner: acme
    repo: widget
    jira:
      key: PROJ
      fixVersionPrefix: "widget-"
    branches:
      - name: master
      - name: release-1.4
        version: "1.4"
        syncFrom:
          branch: master
`,
  )

// ── GitHub stand-in ──

interface FakeGitHubOptions {
  /** Branch and tag heads keyed by `owner/repo:heads/name`. */
  refs?: Record<string, string>
  /** Full tag refs (`refs/tags/v1.4.0`) keyed by `owner/repo`. */
  tags?: Record<string, string[]>
  pullRequests?: PullRequest[]
  comments?: IssueComment[]
}

export const createFakeGitHub = (opts: FakeGitHubOptions = {}) => {
  const refs = new Map(Object.entries(opts.refs ?? {}))
  const comments: IssueComment[] = [...(opts.comments ?? [])]
  const checkRuns: CheckRunInput[] = []
  let clock = Date.parse("2024-03-01T12:00:00Z")
  let nextId = 1000
  const tick = () => {
    clock += 1000
    return new Date(clock)
  }

  const github = {
    getRef: vi.fn(async (owner: string, repo: string, ref: string) => {
      const sha = refs.get(`${owner}/${repo}:${ref}`)
      if (!sha) throw new RemoteRejectedError(`get ref ${owner}/${repo} ${ref}`, 404)
      return sha
    }),
    updateRef: vi.fn(async (owner: string, repo: string, ref: string, sha: string) => {
      refs.set(`${owner}/${repo}:${ref}`, sha)
    }),
    listMatchingRefs: vi.fn(async (owner: string, repo: string, prefix: string) =>
      (opts.tags?.[`${owner}/${repo}`] ?? []).filter((ref) => ref.startsWith(`refs/${prefix}`)),
    ),
    getPullRequest: vi.fn(async (owner: string, repo: string, number: number) => {
      const pr = (opts.pullRequests ?? []).find(
        (p) => p.number === number && p.base.repo.owner.login === owner && p.base.repo.name === repo,
      )
      if (!pr) throw new RemoteRejectedError(`get pull request ${owner}/${repo}#${number}`, 404)
      return pr
    }),
    listIssueComments: vi.fn(async (_owner: string, _repo: string, _number: number) =>
      comments.map((c) => ({ ...c })),
    ),
    createIssueComment: vi.fn(async (_owner: string, _repo: string, _number: number, body: string) => {
      const comment: IssueComment = { id: nextId++, body, authorLogin: BOT_LOGIN, createdAt: tick() }
      comments.push(comment)
      return { ...comment }
    }),
    deleteIssueComment: vi.fn(async (_owner: string, _repo: string, commentId: number) => {
      const index = comments.findIndex((c) => c.id === commentId)
      if (index >= 0) comments.splice(index, 1)
    }),
    createCheckRun: vi.fn(async (_owner: string, _repo: string, input: CheckRunInput) => {
      checkRuns.push(input)
      return { id: nextId++, completedAt: input.status === "completed" ? tick() : null }
    }),
    getAppSlug: vi.fn(async () => TEST_APP_SLUG),
  } satisfies SourceControl

  return { github, refs, comments, checkRuns, tick }
}

// ── Jira stand-in ──

export const createFakeJira = (
  issues: JiraIssue[] = [],
  transitions: Record<string, JiraTransition[]> = {},
) => {
  const store = new Map(issues.map((issue) => [issue.key, { ...issue, fixVersions: [...issue.fixVersions] }]))
  const jiraComments: { key: string; body: string }[] = []

  const jira = {
    getIssue: vi.fn(async (key: string) => {
      const issue = store.get(key)
      if (!issue) throw new RemoteRejectedError(`get issue ${key}`, 404)
      return { ...issue, fixVersions: [...issue.fixVersions] }
    }),
    getTransitions: vi.fn(async (key: string) => transitions[key] ?? []),
    doTransition: vi.fn(async (key: string, transitionId: string) => {
      const issue = store.get(key)
      const transition = (transitions[key] ?? []).find((t) => t.id === transitionId)
      if (issue && transition) issue.status = transition.to
    }),
    addFixVersion: vi.fn(async (key: string, fixVersion: string) => {
      store.get(key)?.fixVersions.push(fixVersion)
    }),
    addComment: vi.fn(async (key: string, body: string) => {
      jiraComments.push({ key, body })
    }),
  } satisfies IssueTracker

  return { jira, issues: store, jiraComments }
}
