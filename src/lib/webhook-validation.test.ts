import { describe, expect, it } from "vitest"
import { DecodeError } from "./errors"
import {
  checkSuitePayload,
  issueCommentPayload,
  makePullRequest,
  pullRequestPayload,
  pushPayload,
} from "./test-helpers"
import { decodeWebhookEvent, isHandledEvent } from "./webhook-validation"

const encode = (payload: unknown) => JSON.stringify(payload)

describe("decodeWebhookEvent", () => {
  it("decodes branch pushes", () => {
    expect(decodeWebhookEvent("push", encode(pushPayload("refs/heads/master")))).toEqual({
      kind: "branch_push",
      owner: "acme",
      repo: "widget",
      branch: "master",
    })
  })

  it("keeps slashes in branch names", () => {
    const event = decodeWebhookEvent("push", encode(pushPayload("refs/heads/release/1.4")))
    expect(event).toMatchObject({ kind: "branch_push", branch: "release/1.4" })
  })

  it("decodes tag pushes", () => {
    expect(decodeWebhookEvent("push", encode(pushPayload("refs/tags/v1.4.3")))).toEqual({
      kind: "tag_push",
      owner: "acme",
      repo: "widget",
      tag: "v1.4.3",
    })
  })

  it("ignores pushes to other refs", () => {
    expect(decodeWebhookEvent("push", encode(pushPayload("refs/notes/commits")))).toBeNull()
  })

  it("decodes rerequested check suites", () => {
    expect(
      decodeWebhookEvent("check_suite", encode(checkSuitePayload("rerequested", 77, [3, 4]))),
    ).toEqual({
      kind: "check_suite_rerequest",
      owner: "acme",
      repo: "widget",
      appId: 77,
      pullRequests: [3, 4],
    })
  })

  it("ignores other check suite actions", () => {
    expect(
      decodeWebhookEvent("check_suite", encode(checkSuitePayload("completed", 77, [3]))),
    ).toBeNull()
  })

  it("decodes created comments and tells pull requests from issues", () => {
    expect(decodeWebhookEvent("issue_comment", encode(issueCommentPayload("/recheck")))).toEqual({
      kind: "issue_comment_create",
      owner: "acme",
      repo: "widget",
      issue: { number: 1, title: "Fix build (PROJ-1)", state: "open", isPullRequest: true },
      comment: { body: "/recheck" },
    })

    const onIssue = decodeWebhookEvent(
      "issue_comment",
      encode(issueCommentPayload("/recheck", { isPullRequest: false })),
    )
    expect(onIssue).toMatchObject({ issue: { isPullRequest: false } })
  })

  it("ignores edited comments", () => {
    expect(
      decodeWebhookEvent("issue_comment", encode(issueCommentPayload("/recheck", { action: "edited" }))),
    ).toBeNull()
  })

  it.each(["opened", "edited", "closed", "synchronize"])("decodes pull_request %s", (action) => {
    const pr = makePullRequest({ number: 9 })
    expect(decodeWebhookEvent("pull_request", encode(pullRequestPayload(action, pr)))).toEqual({
      kind: "pull_request",
      action,
      owner: "acme",
      repo: "widget",
      pullRequest: pr,
    })
  })

  it("ignores other pull request actions", () => {
    expect(decodeWebhookEvent("pull_request", encode(pullRequestPayload("labeled")))).toBeNull()
  })

  it("ignores events it does not handle without parsing them", () => {
    expect(decodeWebhookEvent("ping", "not json")).toBeNull()
    expect(decodeWebhookEvent("", "{}")).toBeNull()
  })

  it("rejects malformed JSON", () => {
    expect(() => decodeWebhookEvent("push", "{")).toThrow(
      new DecodeError("push", "payload is not valid JSON"),
    )
  })

  it("rejects payloads of the wrong shape", () => {
    expect(() => decodeWebhookEvent("push", encode({ ref: 5 }))).toThrow(DecodeError)
    expect(() =>
      decodeWebhookEvent("pull_request", encode({ action: "opened", pull_request: {} })),
    ).toThrow(/^failed to decode pull_request event: /)
  })
})

describe("isHandledEvent", () => {
  it("knows the handled event names", () => {
    expect(["push", "check_suite", "issue_comment", "pull_request"].every(isHandledEvent)).toBe(true)
    expect(isHandledEvent("check_run")).toBe(false)
  })
})
