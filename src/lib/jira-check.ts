import type { BranchConfig, JiraConfig, JiraRule } from "./configuration"
import { RemoteRejectedError } from "./errors"
import type { CheckConclusion, CheckRunOutput, SourceControl } from "./github-client"
import type { IssueTracker, JiraIssue, JiraTransition } from "./jira-client"
import { extractIssueKey, matchCondition, renderTemplate, type CheckEvent } from "./jira-rules"
import { log } from "./logger"
import { pullRequestRepo, type PullRequest } from "./pull-request"
import type { VersionCache } from "./version-cache"

export const CHECK_NAME = "Pull Request Title"
export const INTERNAL_ERROR_MARKER = "<!-- branch-keeper: jira internal error -->"

const RETRY_HINT = "You can retry the check by commenting `/recheck` on the pull request."

interface CheckTarget {
  owner: string
  repo: string
  number: number
  headSha: string
}

const prName = (t: CheckTarget) => `${t.owner}/${t.repo}#${t.number}`

const errorText = (error: unknown) => (error instanceof Error ? error.message : String(error))

const wrap = (message: string, cause: unknown) =>
  new Error(`${message}: ${errorText(cause)}`, { cause })

/**
 * Validates the Jira reference in pull request titles and applies the
 * repository's Jira rules. The outcome is reported as the "Pull Request
 * Title" check run; Jira outages are reported as a pull request comment that
 * is removed again once a later run gets through.
 */
export class JiraCheck {
  private cachedBotLogin = ""

  constructor(
    private readonly github: SourceControl,
    private readonly jira: IssueTracker,
    private readonly versions: VersionCache,
  ) {}

  private async botLogin(): Promise<string> {
    if (!this.cachedBotLogin) {
      const slug = await this.github.getAppSlug()
      this.cachedBotLogin = `${slug}[bot]`
    }
    return this.cachedBotLogin
  }

  private async deleteOldComments(target: CheckTarget, createdBefore: Date): Promise<void> {
    const login = await this.botLogin()
    const comments = await this.github.listIssueComments(target.owner, target.repo, target.number)

    for (const comment of comments) {
      if (
        comment.authorLogin !== login ||
        comment.createdAt.getTime() >= createdBefore.getTime() ||
        !comment.body.includes(INTERNAL_ERROR_MARKER)
      ) {
        continue
      }
      try {
        await this.github.deleteIssueComment(target.owner, target.repo, comment.id)
      } catch (error) {
        log.debug("Failed to delete comment", {
          pr: prName(target),
          commentId: comment.id,
          error: errorText(error),
        })
      }
    }
  }

  private async cleanupComments(target: CheckTarget, createdBefore: Date): Promise<void> {
    try {
      await this.deleteOldComments(target, createdBefore)
    } catch (error) {
      log.debug("Failed to delete old comments", { pr: prName(target), error: errorText(error) })
    }
  }

  private async reportTitleResult(
    target: CheckTarget,
    conclusion: CheckConclusion,
    output: CheckRunOutput,
  ): Promise<void> {
    log.debug("Reporting Pull Request Title result", {
      pr: prName(target),
      conclusion,
      title: output.title,
    })

    const checkRun = await this.github.createCheckRun(target.owner, target.repo, {
      name: CHECK_NAME,
      headSha: target.headSha,
      status: "completed",
      conclusion,
      output,
    })

    if (checkRun.completedAt) {
      await this.cleanupComments(target, checkRun.completedAt)
    }
  }

  private async reportInternalError(target: CheckTarget, message: string): Promise<void> {
    log.debug("Reporting internal error", { pr: prName(target), message })

    try {
      await this.github.createCheckRun(target.owner, target.repo, {
        name: CHECK_NAME,
        headSha: target.headSha,
        status: "queued",
      })
    } catch (error) {
      log.debug("Failed to queue check run", { pr: prName(target), error: errorText(error) })
    }

    const comment = await this.github.createIssueComment(
      target.owner,
      target.repo,
      target.number,
      `${message}\n${INTERNAL_ERROR_MARKER}\n`,
    )
    if (comment.authorLogin) {
      this.cachedBotLogin = comment.authorLogin
    }
    await this.cleanupComments(target, comment.createdAt)
  }

  private async transitionTo(issue: JiraIssue, desiredStatus: string): Promise<void> {
    log.debug("Transitioning issue", { issue: issue.key, from: issue.status, to: desiredStatus })

    let transitions: JiraTransition[]
    try {
      transitions = await this.jira.getTransitions(issue.key)
    } catch (error) {
      throw wrap(`failed to get transitions for issue ${issue.key}`, error)
    }

    const transition = transitions.find((t) => t.to === desiredStatus)
    if (!transition) {
      log.debug("No transition leads to the desired status", {
        issue: issue.key,
        to: desiredStatus,
        available: transitions.map((t) => t.to),
      })
      return
    }

    try {
      await this.jira.doTransition(issue.key, transition.id)
    } catch (error) {
      throw wrap(`failed to transition issue ${issue.key} with transition ${transition.name}`, error)
    }
  }

  private async applyRule(
    issue: JiraIssue,
    pr: PullRequest,
    fixVersion: string,
    rule: JiraRule,
  ): Promise<void> {
    if (rule.setFixVersion && fixVersion !== "" && !issue.fixVersions.includes(fixVersion)) {
      try {
        await this.jira.addFixVersion(issue.key, fixVersion)
      } catch (error) {
        throw wrap(`failed to set fix version ${fixVersion} for issue ${issue.key}`, error)
      }
    }

    if (rule.comment !== "") {
      const body = renderTemplate(rule.comment, { pullRequest: pr })
      try {
        await this.jira.addComment(issue.key, body)
      } catch (error) {
        throw wrap(`failed to add comment to issue ${issue.key}`, error)
      }
    }

    if (rule.transitionTo !== "") {
      await this.transitionTo(issue, rule.transitionTo)
    }
  }

  async run(
    event: CheckEvent,
    jiraConfig: JiraConfig,
    branchConfig: BranchConfig,
    pr: PullRequest,
  ): Promise<void> {
    if (jiraConfig.key === "") return

    const { owner, repo } = pullRequestRepo(pr)
    const target: CheckTarget = { owner, repo, number: pr.number, headSha: pr.head.sha }

    log.debug("Checking pull request", { pr: prName(target), event })

    const key = extractIssueKey(pr.title)
    if (!key.startsWith(`${jiraConfig.key}-`)) {
      let summary =
        key === ""
          ? "This check is skipped because the pull request title does not have a Jira issue in the title.\n"
          : `This check is skipped because the Jira issue \`${key}\` is not from the ${jiraConfig.key} project.\n`
      summary += `\nThe title should be in the format \`Title (${jiraConfig.key}-123)\` and the Jira issue should be from the ${jiraConfig.key} project.\n`

      await this.reportTitleResult(target, "success", {
        title: "Pull request does not have a Jira issue in the title",
        summary,
      })
      return
    }

    let issue: JiraIssue
    try {
      issue = await this.jira.getIssue(key)
    } catch (error) {
      log.debug("Failed to get Jira issue", { pr: prName(target), issue: key, error: errorText(error) })

      if (!(error instanceof RemoteRejectedError)) {
        await this.reportInternalError(target, `The Jira server is not reachable. ${RETRY_HINT}`)
        return
      }
      if (error.status !== 404) {
        await this.reportInternalError(
          target,
          `The Jira request failed with status code ${error.status}. ${RETRY_HINT}`,
        )
        return
      }
      await this.reportTitleResult(target, "failure", {
        title: `Jira issue ${key} does not exist`,
        summary: `The Jira issue \`${key}\` does not exist.\n`,
      })
      return
    }

    await this.reportTitleResult(target, "success", {
      title: "Pull request title has a valid Jira issue",
      summary: "The pull request title is valid and has a Jira issue.\n",
    })

    let fixVersion = ""
    if (branchConfig.version !== "") {
      let bare: string
      try {
        bare = await this.versions.nextVersion(owner, repo, branchConfig.version)
      } catch (error) {
        throw wrap(`failed to get next version for ${owner}/${repo}:${branchConfig.name}`, error)
      }
      fixVersion = jiraConfig.fixVersionPrefix + bare
    }

    const rule = jiraConfig.rules.find((r) => matchCondition(event, issue, pr, fixVersion, r.when))
    if (!rule) return

    try {
      await this.applyRule(issue, pr, fixVersion, rule)
    } catch (error) {
      log.warn("Failed to apply Jira rule", {
        pr: prName(target),
        issue: issue.key,
        error: errorText(error),
      })
    }
  }
}
