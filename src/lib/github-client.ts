import { Octokit, RequestError } from "octokit"
import { NonFastForwardError, RemoteUnavailableError, toRemoteError } from "./errors"
import { log } from "./logger"
import { pullRequestSchema, type PullRequest } from "./pull-request"

export interface IssueComment {
  id: number
  body: string
  authorLogin: string | null
  createdAt: Date
}

export type CheckConclusion = "success" | "failure" | "neutral"

export interface CheckRunOutput {
  title: string
  summary: string
}

export type CheckRunInput =
  | {
      name: string
      headSha: string
      status: "completed"
      conclusion: CheckConclusion
      output: CheckRunOutput
    }
  | {
      name: string
      headSha: string
      status: "queued"
    }

export interface CheckRun {
  id: number
  completedAt: Date | null
}

/**
 * The source-control operations the bot needs. Refs are given without the
 * `refs/` prefix (`heads/main`, `tags/v`), the same way the Git database API
 * takes them.
 */
export interface SourceControl {
  getRef(owner: string, repo: string, ref: string): Promise<string>
  updateRef(owner: string, repo: string, ref: string, sha: string): Promise<void>
  listMatchingRefs(owner: string, repo: string, prefix: string): Promise<string[]>
  getPullRequest(owner: string, repo: string, number: number): Promise<PullRequest>
  listIssueComments(owner: string, repo: string, number: number): Promise<IssueComment[]>
  createIssueComment(owner: string, repo: string, number: number, body: string): Promise<IssueComment>
  deleteIssueComment(owner: string, repo: string, commentId: number): Promise<void>
  createCheckRun(owner: string, repo: string, input: CheckRunInput): Promise<CheckRun>
  /** Slug of the GitHub App this client acts as. */
  getAppSlug(): Promise<string>
}

export interface TokenSource {
  installationToken(): Promise<string>
  appJWT(): Promise<string>
}

const toDate = (value: string | null | undefined): Date | null => (value ? new Date(value) : null)

// GitHub answers 422 "Update is not a fast forward" for a diverged non-force update.
// Other 422s ("Object does not exist", "Reference does not exist") are plain rejections.
const isNonFastForward = (error: unknown): boolean =>
  error instanceof RequestError && error.status === 422 && /fast[- ]forward/i.test(error.message)

// GitHub API client acting as one App installation
export class GitHubClient implements SourceControl {
  private octokit: Octokit | null = null
  private octokitToken: string | null = null

  constructor(private readonly tokens: TokenSource) {}

  private async rest(): Promise<Octokit> {
    let token: string
    try {
      token = await this.tokens.installationToken()
    } catch (error) {
      throw new RemoteUnavailableError("get installation token", error)
    }
    if (!this.octokit || this.octokitToken !== token) {
      this.octokit = new Octokit({ auth: token })
      this.octokitToken = token
    }
    return this.octokit
  }

  async getRef(owner: string, repo: string, ref: string): Promise<string> {
    const octokit = await this.rest()
    try {
      const { data } = await octokit.rest.git.getRef({ owner, repo, ref })
      return data.object.sha
    } catch (error) {
      throw toRemoteError(error, `get ref ${owner}/${repo} ${ref}`)
    }
  }

  async updateRef(owner: string, repo: string, ref: string, sha: string): Promise<void> {
    const octokit = await this.rest()
    try {
      await octokit.rest.git.updateRef({ owner, repo, ref, sha, force: false })
    } catch (error) {
      if (isNonFastForward(error)) {
        throw new NonFastForwardError(`${owner}/${repo} ${ref}`, error)
      }
      throw toRemoteError(error, `update ref ${owner}/${repo} ${ref}`)
    }
  }

  async listMatchingRefs(owner: string, repo: string, prefix: string): Promise<string[]> {
    const octokit = await this.rest()
    try {
      const refs = await octokit.paginate(octokit.rest.git.listMatchingRefs, {
        owner,
        repo,
        ref: prefix,
        per_page: 100,
      })
      return refs.map((r) => r.ref)
    } catch (error) {
      throw toRemoteError(error, `list refs ${owner}/${repo} ${prefix}`)
    }
  }

  async getPullRequest(owner: string, repo: string, number: number): Promise<PullRequest> {
    const octokit = await this.rest()
    try {
      const { data } = await octokit.rest.pulls.get({ owner, repo, pull_number: number })
      return pullRequestSchema.parse(data)
    } catch (error) {
      throw toRemoteError(error, `get pull request ${owner}/${repo}#${number}`)
    }
  }

  async listIssueComments(owner: string, repo: string, number: number): Promise<IssueComment[]> {
    const octokit = await this.rest()
    try {
      const comments = await octokit.paginate(octokit.rest.issues.listComments, {
        owner,
        repo,
        issue_number: number,
        per_page: 100,
      })
      return comments.map((c) => ({
        id: c.id,
        body: c.body ?? "",
        authorLogin: c.user?.login ?? null,
        createdAt: new Date(c.created_at),
      }))
    } catch (error) {
      throw toRemoteError(error, `list comments ${owner}/${repo}#${number}`)
    }
  }

  async createIssueComment(
    owner: string,
    repo: string,
    number: number,
    body: string,
  ): Promise<IssueComment> {
    const octokit = await this.rest()
    try {
      const { data } = await octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: number,
        body,
      })
      return {
        id: data.id,
        body: data.body ?? body,
        authorLogin: data.user?.login ?? null,
        createdAt: new Date(data.created_at),
      }
    } catch (error) {
      throw toRemoteError(error, `create comment ${owner}/${repo}#${number}`)
    }
  }

  async deleteIssueComment(owner: string, repo: string, commentId: number): Promise<void> {
    const octokit = await this.rest()
    try {
      await octokit.rest.issues.deleteComment({ owner, repo, comment_id: commentId })
    } catch (error) {
      throw toRemoteError(error, `delete comment ${owner}/${repo} ${commentId}`)
    }
  }

  async createCheckRun(owner: string, repo: string, input: CheckRunInput): Promise<CheckRun> {
    const octokit = await this.rest()
    try {
      const { data } =
        input.status === "completed"
          ? await octokit.rest.checks.create({
              owner,
              repo,
              name: input.name,
              head_sha: input.headSha,
              status: "completed",
              conclusion: input.conclusion,
              output: input.output,
            })
          : await octokit.rest.checks.create({
              owner,
              repo,
              name: input.name,
              head_sha: input.headSha,
              status: "queued",
            })
      return { id: data.id, completedAt: toDate(data.completed_at) }
    } catch (error) {
      throw toRemoteError(error, `create check run on ${owner}/${repo}@${input.headSha}`)
    }
  }

  async getAppSlug(): Promise<string> {
    let jwt: string
    try {
      jwt = await this.tokens.appJWT()
    } catch (error) {
      throw new RemoteUnavailableError("sign app JWT", error)
    }
    try {
      const { data } = await new Octokit({ auth: jwt }).rest.apps.getAuthenticated()
      const slug = data?.slug
      if (!slug) throw new Error("app has no slug")
      log.debug("Resolved app identity", { slug })
      return slug
    } catch (error) {
      throw toRemoteError(error, "get current app")
    }
  }
}
