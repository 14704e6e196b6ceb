import { handleCheckSuiteRerequest } from "./ci-cd"
import { handleIssueCommentCreate } from "./issue-comment"
import { logWebhookHandler } from "./logging"
import { handlePullRequestEvent } from "./pull-request"
import { handleBranchPush, handleTagPush } from "./push"
import type { Reactor, ReactorContext, ReactorEvent } from "./types"

const assertNever = (event: never): never => {
  throw new Error(`Unhandled event: ${JSON.stringify(event)}`)
}

export function createReactor(ctx: ReactorContext): Reactor {
  return {
    async handle(event: ReactorEvent) {
      switch (event.kind) {
        case "branch_push":
          logWebhookHandler(event, "handleBranchPush")
          return handleBranchPush(ctx, event)
        case "tag_push":
          logWebhookHandler(event, "handleTagPush")
          return handleTagPush(ctx, event)
        case "check_suite_rerequest":
          logWebhookHandler(event, "handleCheckSuiteRerequest")
          return handleCheckSuiteRerequest(ctx, event)
        case "issue_comment_create":
          logWebhookHandler(event, "handleIssueCommentCreate")
          return handleIssueCommentCreate(ctx, event)
        case "pull_request":
          logWebhookHandler(event, "handlePullRequestEvent")
          return handlePullRequestEvent(ctx, event)
        default:
          return assertNever(event)
      }
    },
  }
}
