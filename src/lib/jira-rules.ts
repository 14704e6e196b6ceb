import type { JiraCondition } from "./configuration"
import type { JiraIssue } from "./jira-client"
import { isMerged, type PullRequest } from "./pull-request"

export type CheckEvent = "opened" | "edited" | "closed" | "sync" | "recheck"

const TITLE_JIRA_REGEX = / \(([A-Z]+-[0-9]+)\)$/

/** The `PROJECT-123` key at the end of a title such as `Fix build (PROJECT-123)`. */
export const extractIssueKey = (title: string): string => TITLE_JIRA_REGEX.exec(title)?.[1] ?? ""

/**
 * All predicates present on the condition must hold. `hasFixVersion` never
 * matches when no fix-version could be computed for the target branch.
 */
export const matchCondition = (
  event: CheckEvent,
  issue: JiraIssue,
  pr: PullRequest,
  fixVersion: string,
  cond: JiraCondition,
): boolean => {
  if (cond.status && cond.status.length > 0 && !cond.status.includes(issue.status)) {
    return false
  }
  if (cond.merged !== undefined && isMerged(pr) !== cond.merged) {
    return false
  }
  if (cond.hasFixVersion !== undefined) {
    if (fixVersion === "") return false
    if (issue.fixVersions.includes(fixVersion) !== cond.hasFixVersion) return false
  }
  if (cond.event && cond.event.length > 0 && !cond.event.includes(event)) {
    return false
  }
  return true
}

const getValueByPath = (obj: unknown, path: string): unknown => {
  let current: unknown = obj
  for (const part of path.split(".")) {
    if (current === null || current === undefined || typeof current !== "object") return undefined
    current = Reflect.get(current, part)
  }
  return current
}

/**
 * Fill `{{ path.to.field }}` placeholders from `data`. Missing fields and
 * objects render as an empty string.
 */
export const renderTemplate = (template: string, data: Record<string, unknown>): string =>
  template.replace(/\{\{\s*([A-Za-z0-9_.]+)\s*\}\}/g, (_, path: string) => {
    const value = getValueByPath(data, path)
    if (typeof value === "string") return value
    if (typeof value === "number" || typeof value === "boolean") return String(value)
    return ""
  })
