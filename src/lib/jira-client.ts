import { z } from "zod/v4"
import { RemoteRejectedError, RemoteUnavailableError } from "./errors"
import { log } from "./logger"

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    status: z.object({ name: z.string() }),
    fixVersions: z.array(z.object({ name: z.string() })).default([]),
  }),
})

const transitionsSchema = z.object({
  transitions: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      to: z.object({ name: z.string() }),
    }),
  ),
})

export interface JiraIssue {
  key: string
  status: string
  fixVersions: string[]
}

export interface JiraTransition {
  id: string
  name: string
  to: string
}

/**
 * The issue-tracker operations the rule engine needs. Failures reject with
 * RemoteUnavailableError (no response) or RemoteRejectedError (non-2xx, or a
 * body that does not decode).
 */
export interface IssueTracker {
  getIssue(key: string): Promise<JiraIssue>
  getTransitions(key: string): Promise<JiraTransition[]>
  doTransition(key: string, transitionId: string): Promise<void>
  addFixVersion(key: string, fixVersion: string): Promise<void>
  addComment(key: string, body: string): Promise<void>
}

/**
 * Minimal Jira REST v2 client authenticated with a personal access token.
 */
export class JiraClient implements IssueTracker {
  private readonly baseUrl: string

  constructor(
    endpoint: string,
    private readonly token: string,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = endpoint.replace(/\/+$/, "")
  }

  private async request(
    what: string,
    method: "GET" | "POST" | "PUT",
    path: string,
    body?: unknown,
  ): Promise<{ status: number; text: string }> {
    let response: Response
    try {
      response = await this.fetchFn(`${this.baseUrl}/rest/api/2${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
          ...(body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      })
    } catch (error) {
      throw new RemoteUnavailableError(what, error)
    }

    if (!response.ok) {
      const text = await response.text()
      log.debug("Jira request rejected", { what, status: response.status, body: text.slice(0, 200) })
      throw new RemoteRejectedError(what, response.status, new Error(text || response.statusText))
    }

    return { status: response.status, text: await response.text() }
  }

  // A 2xx whose body does not decode is reported with its status, like any other rejection.
  private async get<T>(what: string, path: string, schema: z.ZodType<T>): Promise<T> {
    const { status, text } = await this.request(what, "GET", path)
    let data: unknown
    try {
      data = JSON.parse(text)
    } catch (error) {
      log.debug("Jira answered with a non-JSON body", { what, body: text.slice(0, 200) })
      throw new RemoteRejectedError(
        what,
        status,
        new Error("response is not valid JSON", { cause: error }),
      )
    }
    const result = schema.safeParse(data)
    if (!result.success) {
      throw new RemoteRejectedError(
        what,
        status,
        new Error(`unexpected response body: ${z.prettifyError(result.error)}`),
      )
    }
    return result.data
  }

  async getIssue(key: string): Promise<JiraIssue> {
    const issue = await this.get(
      `get issue ${key}`,
      `/issue/${encodeURIComponent(key)}?fields=status,fixVersions`,
      issueSchema,
    )
    return {
      key: issue.key,
      status: issue.fields.status.name,
      fixVersions: issue.fields.fixVersions.map((v) => v.name),
    }
  }

  async getTransitions(key: string): Promise<JiraTransition[]> {
    const { transitions } = await this.get(
      `get transitions for ${key}`,
      `/issue/${encodeURIComponent(key)}/transitions`,
      transitionsSchema,
    )
    return transitions.map((t) => ({ id: t.id, name: t.name, to: t.to.name }))
  }

  async doTransition(key: string, transitionId: string): Promise<void> {
    await this.request(
      `transition ${key}`,
      "POST",
      `/issue/${encodeURIComponent(key)}/transitions`,
      { transition: { id: transitionId } },
    )
  }

  async addFixVersion(key: string, fixVersion: string): Promise<void> {
    await this.request(`add fix version to ${key}`, "PUT", `/issue/${encodeURIComponent(key)}`, {
      update: { fixVersions: [{ add: { name: fixVersion } }] },
    })
  }

  async addComment(key: string, body: string): Promise<void> {
    await this.request(`comment on ${key}`, "POST", `/issue/${encodeURIComponent(key)}/comment`, {
      body,
    })
  }
}
