import { z } from "zod/v4"
import { DecodeError } from "@/lib/errors"
import { pullRequestSchema } from "@/lib/pull-request"
import type { HandledEventName, PullRequestAction, ReactorEvent } from "@/lib/webhooks/types"

const repositorySchema = z.object({
  name: z.string(),
  owner: z.object({
    login: z.string(),
  }),
})

export const pushPayloadSchema = z.object({
  ref: z.string(),
  repository: repositorySchema,
})

export const checkSuitePayloadSchema = z.object({
  action: z.string(),
  check_suite: z.object({
    app: z.object({ id: z.number() }).nullable().optional(),
    pull_requests: z.array(z.object({ number: z.number().int() })).default([]),
  }),
  repository: repositorySchema,
})

export const issueCommentPayloadSchema = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number().int(),
    title: z.string().default(""),
    state: z.string(),
    pull_request: z.looseObject({}).nullable().optional(),
  }),
  comment: z.object({
    body: z.string().nullable().default(""),
  }),
  repository: repositorySchema,
})

export const pullRequestPayloadSchema = z.object({
  action: z.string(),
  pull_request: pullRequestSchema,
  repository: repositorySchema,
})

const HANDLED_EVENTS: ReadonlySet<string> = new Set<HandledEventName>([
  "push",
  "check_suite",
  "issue_comment",
  "pull_request",
])

export const isHandledEvent = (event: string): event is HandledEventName => HANDLED_EVENTS.has(event)

const PULL_REQUEST_ACTIONS: ReadonlySet<string> = new Set<PullRequestAction>([
  "opened",
  "edited",
  "closed",
  "synchronize",
])

const isPullRequestAction = (action: string): action is PullRequestAction =>
  PULL_REQUEST_ACTIONS.has(action)

const decodeWith = <T>(event: string, schema: z.ZodType<T>, payload: unknown): T => {
  const result = schema.safeParse(payload)
  if (!result.success) {
    throw new DecodeError(event, result.error.message, result.error)
  }
  return result.data
}

const parseJson = (event: string, raw: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch (error) {
    throw new DecodeError(event, "payload is not valid JSON", error)
  }
}

/**
 * Turn a raw delivery into a typed event. Returns null for events, actions
 * and refs the bot does not react to; throws DecodeError when a handled
 * event's payload does not have the expected shape.
 */
export const decodeWebhookEvent = (event: string, rawBody: string): ReactorEvent | null => {
  if (!isHandledEvent(event)) return null
  const payload = parseJson(event, rawBody)

  switch (event) {
    case "push": {
      const push = decodeWith(event, pushPayloadSchema, payload)
      const owner = push.repository.owner.login
      const repo = push.repository.name
      if (push.ref.startsWith("refs/heads/")) {
        return { kind: "branch_push", owner, repo, branch: push.ref.slice("refs/heads/".length) }
      }
      if (push.ref.startsWith("refs/tags/")) {
        return { kind: "tag_push", owner, repo, tag: push.ref.slice("refs/tags/".length) }
      }
      return null
    }
    case "check_suite": {
      const suite = decodeWith(event, checkSuitePayloadSchema, payload)
      if (suite.action !== "rerequested") return null
      return {
        kind: "check_suite_rerequest",
        owner: suite.repository.owner.login,
        repo: suite.repository.name,
        appId: suite.check_suite.app?.id ?? null,
        pullRequests: suite.check_suite.pull_requests.map((pr) => pr.number),
      }
    }
    case "issue_comment": {
      const comment = decodeWith(event, issueCommentPayloadSchema, payload)
      if (comment.action !== "created") return null
      return {
        kind: "issue_comment_create",
        owner: comment.repository.owner.login,
        repo: comment.repository.name,
        issue: {
          number: comment.issue.number,
          title: comment.issue.title,
          state: comment.issue.state,
          isPullRequest: comment.issue.pull_request != null,
        },
        comment: { body: comment.comment.body ?? "" },
      }
    }
    case "pull_request": {
      const pr = decodeWith(event, pullRequestPayloadSchema, payload)
      if (!isPullRequestAction(pr.action)) return null
      return {
        kind: "pull_request",
        action: pr.action,
        owner: pr.repository.owner.login,
        repo: pr.repository.name,
        pullRequest: pr.pull_request,
      }
    }
  }
}
