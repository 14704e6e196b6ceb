/**
 * Webhook logging helpers.
 * Summarize decoded events into flat context for structured log lines.
 */

import { log } from "@/lib/logger"
import type { ReactorEvent } from "./types"

type EventSummary = {
  kind: ReactorEvent["kind"]
  repo: string
  branch?: string
  tag?: string
  pr?: number
  pullRequests?: number[]
  action?: string
}

type WebhookTraceContext = {
  deliveryId?: string
  event?: string
  handler?: string
  [key: string]: unknown
}

const formatWebhookTracePrefix = (depth: number): string => {
  if (depth <= 0) return "|-"
  return `${"|  ".repeat(depth)}|-`
}

export function summarizeEvent(event: ReactorEvent): EventSummary {
  const repo = `${event.owner}/${event.repo}`
  switch (event.kind) {
    case "branch_push":
      return { kind: event.kind, repo, branch: event.branch }
    case "tag_push":
      return { kind: event.kind, repo, tag: event.tag }
    case "check_suite_rerequest":
      return { kind: event.kind, repo, pullRequests: event.pullRequests }
    case "issue_comment_create":
      return { kind: event.kind, repo, pr: event.issue.number }
    case "pull_request":
      return { kind: event.kind, repo, pr: event.pullRequest.number, action: event.action }
  }
}

export function logWebhookReceived(
  event: string,
  deliveryId: string | null,
  bodyBytes: number,
): void {
  log.info("Webhook received", {
    op: "webhook-received",
    event,
    deliveryId,
    bodyBytes,
  })
}

export function logWebhookHandler(event: ReactorEvent, handler: string): void {
  log.info("Webhook handler invoked", {
    op: "webhook-handler",
    handler,
    ...summarizeEvent(event),
  })
}

/**
 * Emit a tree-style path log line for webhook processing flow.
 * Keep depth stable per handler path so logs are easy to scan.
 */
export function logWebhookPath(
  step: string,
  depth: number,
  context: WebhookTraceContext = {},
): void {
  log.debug(`${formatWebhookTracePrefix(depth)} ${step}`, {
    op: "webhook-path",
    ...context,
  })
}
