import type { CheckEvent } from "@/lib/jira-rules"
import { pullRequestRepo, type PullRequest } from "@/lib/pull-request"
import type { PullRequestAction, PullRequestChangeEvent, ReactorContext } from "./types"
import { logWebhookPath } from "./logging"

const CHECK_EVENTS: Record<PullRequestAction, CheckEvent> = {
  opened: "opened",
  edited: "edited",
  closed: "closed",
  synchronize: "sync",
}

/** Run the Jira check with the configuration of the PR's base branch. */
export async function runJiraCheck(ctx: ReactorContext, event: CheckEvent, pr: PullRequest) {
  const { owner, repo } = pullRequestRepo(pr)
  logWebhookPath(`jira check (${event})`, 2, { pr: `${owner}/${repo}#${pr.number}` })
  try {
    await ctx.jiraCheck.run(
      event,
      ctx.config.jiraFor(owner, repo),
      ctx.config.branchFor(owner, repo, pr.base.ref),
      pr,
    )
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`failed to run jira check: ${message}`, { cause: error })
  }
}

export async function handlePullRequestEvent(ctx: ReactorContext, event: PullRequestChangeEvent) {
  logWebhookPath("pull request", 1, {
    handler: "pull_request",
    action: event.action,
    pr: event.pullRequest.number,
  })
  await runJiraCheck(ctx, CHECK_EVENTS[event.action], event.pullRequest)
}
