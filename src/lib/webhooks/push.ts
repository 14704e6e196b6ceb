import { aggregate } from "@/lib/errors"
import { formatBranch } from "@/lib/configuration"
import type { BranchPushEvent, ReactorContext, TagPushEvent } from "./types"
import { logWebhookPath } from "./logging"

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)))

/**
 * Fast-forward every branch configured to follow the pushed branch. One
 * failing destination does not stop the others; failures are reported
 * together afterwards.
 */
export async function handleBranchPush(ctx: ReactorContext, event: BranchPushEvent) {
  const source = { owner: event.owner, repo: event.repo, branch: event.branch }
  const destinations = ctx.config.branchesSyncedFrom(event.owner, event.repo, event.branch)

  logWebhookPath("branch push", 1, {
    handler: "push",
    source: formatBranch(source),
    destinations: destinations.length,
  })

  const errors: Error[] = []
  for (const destination of destinations) {
    try {
      await ctx.syncer.sync(destination, source)
    } catch (error) {
      errors.push(toError(error))
    }
  }

  const failure = aggregate(errors)
  if (failure) throw failure
}

/** A new tag may publish a release, so every cached patch stream is stale. */
export async function handleTagPush(ctx: ReactorContext, event: TagPushEvent) {
  logWebhookPath("tag push -> invalidate versions", 1, {
    handler: "push",
    repo: `${event.owner}/${event.repo}`,
    tag: event.tag,
  })
  ctx.versions.invalidate()
}
