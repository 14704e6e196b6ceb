import { z } from "zod/v4"

/**
 * The slice of a GitHub pull request the checks rely on. Webhook payloads and
 * REST responses both decode into this shape; unknown fields are kept so
 * comment templates can reference them.
 */
export const pullRequestSchema = z.looseObject({
  number: z.number().int(),
  title: z.string(),
  state: z.string().optional(),
  html_url: z.string().optional(),
  merged_at: z.string().nullable().optional(),
  user: z.looseObject({ login: z.string() }).nullable().optional(),
  head: z.looseObject({
    sha: z.string(),
    ref: z.string().optional(),
  }),
  base: z.looseObject({
    ref: z.string(),
    repo: z.looseObject({
      name: z.string(),
      owner: z.looseObject({ login: z.string() }),
    }),
  }),
})

export type PullRequest = z.infer<typeof pullRequestSchema>

export const isMerged = (pr: PullRequest): boolean => Boolean(pr.merged_at)

export const pullRequestRepo = (pr: PullRequest) => ({
  owner: pr.base.repo.owner.login,
  repo: pr.base.repo.name,
})
