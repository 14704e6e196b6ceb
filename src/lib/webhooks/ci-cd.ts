import type { PullRequest } from "@/lib/pull-request"
import type { CheckSuiteRerequestEvent, ReactorContext } from "./types"
import { logWebhookPath } from "./logging"
import { runJiraCheck } from "./pull-request"

/**
 * "Re-run all checks" on a suite this app created. Suites from other apps are
 * ignored; each linked pull request is fetched again so the check sees its
 * current title.
 */
export async function handleCheckSuiteRerequest(
  ctx: ReactorContext,
  event: CheckSuiteRerequestEvent,
) {
  if (event.appId !== ctx.config.appId) {
    logWebhookPath("check suite from another app, skipping", 1, {
      handler: "check_suite",
      appId: event.appId,
    })
    return
  }

  logWebhookPath("check suite rerequested", 1, {
    handler: "check_suite",
    pullRequests: event.pullRequests,
  })

  for (const number of event.pullRequests) {
    let pr: PullRequest
    try {
      pr = await ctx.github.getPullRequest(event.owner, event.repo, number)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(`failed to get pull request: ${message}`, { cause: error })
    }
    await runJiraCheck(ctx, "recheck", pr)
  }
}
