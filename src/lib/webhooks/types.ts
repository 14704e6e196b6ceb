import type { WebhookEventName } from "@octokit/webhooks-types"
import type { BranchSyncer } from "@/lib/branch-sync"
import type { Configuration } from "@/lib/configuration"
import type { SourceControl } from "@/lib/github-client"
import type { JiraCheck } from "@/lib/jira-check"
import type { PullRequest } from "@/lib/pull-request"
import type { VersionCache } from "@/lib/version-cache"

/** The `x-github-event` values the bot reacts to. */
export type HandledEventName = Extract<
  WebhookEventName,
  "push" | "check_suite" | "issue_comment" | "pull_request"
>

export type PullRequestAction = "opened" | "edited" | "closed" | "synchronize"

interface RepoScoped {
  owner: string
  repo: string
}

export interface BranchPushEvent extends RepoScoped {
  kind: "branch_push"
  branch: string
}

export interface TagPushEvent extends RepoScoped {
  kind: "tag_push"
  tag: string
}

export interface CheckSuiteRerequestEvent extends RepoScoped {
  kind: "check_suite_rerequest"
  appId: number | null
  pullRequests: number[]
}

export interface IssueCommentCreateEvent extends RepoScoped {
  kind: "issue_comment_create"
  issue: {
    number: number
    title: string
    state: string
    isPullRequest: boolean
  }
  comment: {
    body: string
  }
}

export interface PullRequestChangeEvent extends RepoScoped {
  kind: "pull_request"
  action: PullRequestAction
  pullRequest: PullRequest
}

export type ReactorEvent =
  | BranchPushEvent
  | TagPushEvent
  | CheckSuiteRerequestEvent
  | IssueCommentCreateEvent
  | PullRequestChangeEvent

export interface Reactor {
  handle(event: ReactorEvent): Promise<void>
}

/** Everything the event handlers act on; owned by one engine instance. */
export interface ReactorContext {
  config: Configuration
  github: SourceControl
  syncer: BranchSyncer
  versions: VersionCache
  jiraCheck: JiraCheck
}
