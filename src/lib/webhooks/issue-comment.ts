import type { PullRequest } from "@/lib/pull-request"
import type { IssueCommentCreateEvent, ReactorContext } from "./types"
import { logWebhookPath } from "./logging"
import { runJiraCheck } from "./pull-request"

/** A line consisting of `/recheck`, in any case. */
export const RECHECK_COMMAND = /^\s*\/recheck\s*$/im

export const isRecheckCommand = (body: string): boolean => RECHECK_COMMAND.test(body)

export async function handleIssueCommentCreate(
  ctx: ReactorContext,
  event: IssueCommentCreateEvent,
) {
  const { issue } = event
  if (issue.state !== "open" || !issue.isPullRequest || !isRecheckCommand(event.comment.body)) {
    return
  }

  logWebhookPath("recheck requested", 1, { handler: "issue_comment", pr: issue.number })

  let pr: PullRequest
  try {
    pr = await ctx.github.getPullRequest(event.owner, event.repo, issue.number)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`failed to get pull request: ${message}`, { cause: error })
  }
  await runJiraCheck(ctx, "recheck", pr)
}
