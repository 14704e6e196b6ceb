import { afterEach, describe, expect, it, vi } from "vitest"
import type { BranchConfig, JiraConfig, JiraRule } from "./configuration"
import { RemoteRejectedError, RemoteUnavailableError } from "./errors"
import { CHECK_NAME, INTERNAL_ERROR_MARKER, JiraCheck } from "./jira-check"
import type { JiraIssue, JiraTransition } from "./jira-client"
import { log } from "./logger"
import { BOT_LOGIN, createFakeGitHub, createFakeJira, makePullRequest } from "./test-helpers"
import { VersionCache } from "./version-cache"

const RETRY_HINT = "You can retry the check by commenting `/recheck` on the pull request."

const rule = (partial: Partial<JiraRule>): JiraRule => ({
  when: {},
  transitionTo: "",
  setFixVersion: false,
  comment: "",
  ...partial,
})

const jiraConfig = (rules: JiraRule[] = []): JiraConfig => ({
  key: "PROJ",
  fixVersionPrefix: "widget-",
  rules,
})

const master: BranchConfig = { name: "master", version: "" }
const release: BranchConfig = { name: "release-1.4", version: "1.4" }

const issue: JiraIssue = { key: "PROJ-1", status: "In Progress", fixVersions: [] }
const transitions: Record<string, JiraTransition[]> = {
  "PROJ-1": [
    { id: "21", name: "Review", to: "Review" },
    { id: "31", name: "Close", to: "Closed" },
  ],
}

const setup = (issues: JiraIssue[] = [issue]) => {
  const fakeGitHub = createFakeGitHub({
    tags: { "acme/widget": ["refs/tags/v1.4.0", "refs/tags/v1.4.1", "refs/tags/v1.4.2"] },
  })
  const fakeJira = createFakeJira(issues, transitions)
  const check = new JiraCheck(fakeGitHub.github, fakeJira.jira, new VersionCache(fakeGitHub.github))
  return { ...fakeGitHub, ...fakeJira, check }
}

afterEach(() => vi.restoreAllMocks())

describe("JiraCheck title validation", () => {
  it("passes titles without a Jira key without asking Jira", async () => {
    const { github, jira, checkRuns, check } = setup()

    await check.run("opened", jiraConfig(), master, makePullRequest({ title: "Fix build" }))

    expect(jira.getIssue).not.toHaveBeenCalled()
    expect(checkRuns).toEqual([
      {
        name: CHECK_NAME,
        headSha: "head-sha",
        status: "completed",
        conclusion: "success",
        output: {
          title: "Pull request does not have a Jira issue in the title",
          summary:
            "This check is skipped because the pull request title does not have a Jira issue in the title.\n" +
            "\nThe title should be in the format `Title (PROJ-123)` and the Jira issue should be from the PROJ project.\n",
        },
      },
    ])
    expect(github.createCheckRun).toHaveBeenCalledWith("acme", "widget", checkRuns[0])
  })

  it("passes titles with a key from another project", async () => {
    const { jira, checkRuns, check } = setup()

    await check.run("edited", jiraConfig(), master, makePullRequest({ title: "Backport (OTHER-9)" }))

    expect(jira.getIssue).not.toHaveBeenCalled()
    expect(checkRuns[0]).toMatchObject({
      conclusion: "success",
      output: {
        summary:
          "This check is skipped because the Jira issue `OTHER-9` is not from the PROJ project.\n" +
          "\nThe title should be in the format `Title (PROJ-123)` and the Jira issue should be from the PROJ project.\n",
      },
    })
  })

  it("does nothing for repositories without a Jira project", async () => {
    const { github, jira, check } = setup()

    await check.run("opened", { key: "", fixVersionPrefix: "", rules: [] }, master, makePullRequest())

    expect(github.createCheckRun).not.toHaveBeenCalled()
    expect(jira.getIssue).not.toHaveBeenCalled()
  })

  it("fails when the issue does not exist", async () => {
    const { checkRuns, check } = setup([])

    await check.run("opened", jiraConfig(), master, makePullRequest())

    expect(checkRuns).toEqual([
      {
        name: CHECK_NAME,
        headSha: "head-sha",
        status: "completed",
        conclusion: "failure",
        output: {
          title: "Jira issue PROJ-1 does not exist",
          summary: "The Jira issue `PROJ-1` does not exist.\n",
        },
      },
    ])
  })

  it("succeeds when the issue exists", async () => {
    const { checkRuns, check } = setup()

    await check.run("opened", jiraConfig(), master, makePullRequest())

    expect(checkRuns[0]).toMatchObject({
      conclusion: "success",
      output: {
        title: "Pull request title has a valid Jira issue",
        summary: "The pull request title is valid and has a Jira issue.\n",
      },
    })
  })
})

describe("JiraCheck internal errors", () => {
  it("queues the check and comments when Jira answers with an error status", async () => {
    const { github, jira, checkRuns, comments, check } = setup()
    jira.getIssue.mockRejectedValueOnce(new RemoteRejectedError("get issue PROJ-1", 500))

    await check.run("opened", jiraConfig(), master, makePullRequest())

    expect(checkRuns).toEqual([{ name: CHECK_NAME, headSha: "head-sha", status: "queued" }])
    expect(github.createIssueComment).toHaveBeenCalledWith(
      "acme",
      "widget",
      1,
      `The Jira request failed with status code 500. ${RETRY_HINT}\n${INTERNAL_ERROR_MARKER}\n`,
    )
    expect(comments).toHaveLength(1)
  })

  it("comments when Jira is unreachable", async () => {
    const { github, jira, check } = setup()
    jira.getIssue.mockRejectedValueOnce(new RemoteUnavailableError("get issue PROJ-1"))

    await check.run("recheck", jiraConfig(), master, makePullRequest())

    expect(github.createIssueComment).toHaveBeenCalledWith(
      "acme",
      "widget",
      1,
      `The Jira server is not reachable. ${RETRY_HINT}\n${INTERNAL_ERROR_MARKER}\n`,
    )
  })

  it("still comments when queueing the check fails", async () => {
    const { github, jira, check } = setup()
    jira.getIssue.mockRejectedValueOnce(new RemoteUnavailableError("get issue PROJ-1"))
    github.createCheckRun.mockRejectedValueOnce(new Error("checks down"))

    await check.run("recheck", jiraConfig(), master, makePullRequest())

    expect(github.createIssueComment).toHaveBeenCalledTimes(1)
  })

  it("removes earlier error comments once a later run reports a result", async () => {
    const { github, jira, comments, check } = setup()
    comments.push(
      {
        id: 1,
        body: `someone quoting ${INTERNAL_ERROR_MARKER}`,
        authorLogin: "octocat",
        createdAt: new Date("2024-01-01T00:00:00Z"),
      },
      {
        id: 2,
        body: "an unrelated bot comment",
        authorLogin: BOT_LOGIN,
        createdAt: new Date("2024-01-01T00:00:00Z"),
      },
    )
    jira.getIssue.mockRejectedValueOnce(new RemoteUnavailableError("get issue PROJ-1"))
    await check.run("opened", jiraConfig(), master, makePullRequest())
    expect(comments.map((c) => c.id)).toEqual([1, 2, 1001])

    await check.run("recheck", jiraConfig(), master, makePullRequest())

    expect(github.deleteIssueComment).toHaveBeenCalledTimes(1)
    expect(github.deleteIssueComment).toHaveBeenCalledWith("acme", "widget", 1001)
    expect(comments.map((c) => c.id)).toEqual([1, 2])
    expect(github.getAppSlug).not.toHaveBeenCalled()
  })

  it("looks up the app slug when no comment revealed the bot login", async () => {
    const { github, check } = setup()

    await check.run("opened", jiraConfig(), master, makePullRequest())
    await check.run("edited", jiraConfig(), master, makePullRequest())

    expect(github.getAppSlug).toHaveBeenCalledTimes(1)
  })

  it("ignores cleanup failures", async () => {
    const { github, check } = setup()
    github.listIssueComments.mockRejectedValueOnce(new Error("comments down"))

    await expect(
      check.run("opened", jiraConfig(), master, makePullRequest()),
    ).resolves.toBeUndefined()
  })
})

describe("JiraCheck rules", () => {
  const mergedPr = makePullRequest({ base: "release-1.4", mergedAt: "2024-03-01T00:00:00Z" })

  it("applies fix-version, comment and transition of the matching rule", async () => {
    const { jira, issues, check } = setup()
    const rules = [
      rule({
        when: { merged: true },
        setFixVersion: true,
        comment: "Merged in {{pullRequest.html_url}}",
        transitionTo: "Closed",
      }),
    ]

    await check.run("closed", jiraConfig(rules), release, mergedPr)

    expect(jira.addFixVersion).toHaveBeenCalledWith("PROJ-1", "widget-1.4.3")
    expect(jira.addComment).toHaveBeenCalledWith(
      "PROJ-1",
      "Merged in https://github.com/acme/widget/pull/1",
    )
    expect(jira.doTransition).toHaveBeenCalledWith("PROJ-1", "31")
    expect(issues.get("PROJ-1")).toEqual({
      key: "PROJ-1",
      status: "Closed",
      fixVersions: ["widget-1.4.3"],
    })
  })

  it("applies only the first matching rule", async () => {
    const { jira, check } = setup()
    const rules = [
      rule({ when: { status: ["New"] }, comment: "never" }),
      rule({ when: { merged: true }, comment: "first" }),
      rule({ when: { event: ["closed"] }, comment: "second" }),
    ]

    await check.run("closed", jiraConfig(rules), release, mergedPr)

    expect(jira.addComment).toHaveBeenCalledTimes(1)
    expect(jira.addComment).toHaveBeenCalledWith("PROJ-1", "first")
  })

  it("skips a fix-version the issue already has", async () => {
    const { jira, check } = setup([{ ...issue, fixVersions: ["widget-1.4.3"] }])

    await check.run(
      "closed",
      jiraConfig([rule({ setFixVersion: true })]),
      release,
      mergedPr,
    )

    expect(jira.addFixVersion).not.toHaveBeenCalled()
  })

  it("skips the fix-version on branches without a version", async () => {
    const { jira, check } = setup()

    await check.run("closed", jiraConfig([rule({ setFixVersion: true })]), master, mergedPr)

    expect(jira.addFixVersion).not.toHaveBeenCalled()
  })

  it("leaves the status alone when no transition leads to it", async () => {
    const { jira, check } = setup()

    await check.run(
      "closed",
      jiraConfig([rule({ transitionTo: "Verified" })]),
      release,
      mergedPr,
    )

    expect(jira.getTransitions).toHaveBeenCalledWith("PROJ-1")
    expect(jira.doTransition).not.toHaveBeenCalled()
  })

  it("logs rule failures without failing the run", async () => {
    const { jira, check } = setup()
    const warn = vi.spyOn(log, "warn").mockImplementation(() => {})
    jira.addComment.mockRejectedValueOnce(new Error("forbidden"))

    await check.run("closed", jiraConfig([rule({ comment: "hi" })]), release, mergedPr)

    expect(warn).toHaveBeenCalledWith("Failed to apply Jira rule", {
      pr: "acme/widget#1",
      issue: "PROJ-1",
      error: "failed to add comment to issue PROJ-1: forbidden",
    })
  })

  it("rejects when the fix-version cannot be computed", async () => {
    const { github, checkRuns, check } = setup()
    github.listMatchingRefs.mockRejectedValueOnce(new Error("tags down"))

    await expect(check.run("closed", jiraConfig(), release, mergedPr)).rejects.toThrow(
      "failed to get next version for acme/widget:release-1.4: tags down",
    )
    expect(checkRuns[0]).toMatchObject({ conclusion: "success" })
  })
})
