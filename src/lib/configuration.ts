import { readFile } from "node:fs/promises"
import { parse as parseYaml } from "yaml"
import { z } from "zod/v4"

export const branchReferenceSchema = z.object({
  owner: z.string().default(""),
  repo: z.string().default(""),
  branch: z.string().default(""),
})

export const jiraConditionSchema = z.object({
  status: z.array(z.string()).optional(),
  merged: z.boolean().optional(),
  hasFixVersion: z.boolean().optional(),
  event: z.array(z.string()).optional(),
})

export const jiraRuleSchema = z.object({
  when: jiraConditionSchema.default({}),
  transitionTo: z.string().default(""),
  setFixVersion: z.boolean().default(false),
  comment: z.string().default(""),
})

export const jiraConfigSchema = z.object({
  key: z.string().default(""),
  fixVersionPrefix: z.string().default(""),
  rules: z.array(jiraRuleSchema).default([]),
})

export const branchConfigSchema = z.object({
  name: z.string().min(1),
  syncFrom: branchReferenceSchema.optional(),
  version: z.string().default(""),
})

export const repositoryConfigSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  jira: jiraConfigSchema.optional(),
  branches: z.array(branchConfigSchema).default([]),
})

export const configurationSchema = z.object({
  appId: z.number().int().positive(),
  installationId: z.number().int().positive(),
  repositories: z.array(repositoryConfigSchema).default([]),
})

export type BranchReference = { owner: string; repo: string; branch: string }
export type JiraCondition = z.infer<typeof jiraConditionSchema>
export type JiraRule = z.infer<typeof jiraRuleSchema>
export type JiraConfig = z.infer<typeof jiraConfigSchema>
export type BranchConfig = z.infer<typeof branchConfigSchema>
export type RepositoryConfig = z.infer<typeof repositoryConfigSchema>

export const formatBranch = (ref: BranchReference): string =>
  `${ref.owner}/${ref.repo}:${ref.branch}`

export const sameBranch = (a: BranchReference, b: BranchReference): boolean =>
  a.owner === b.owner && a.repo === b.repo && a.branch === b.branch

export interface SyncPair {
  destination: BranchReference
  source: BranchReference
}

const emptyJiraConfig = (): JiraConfig => ({ key: "", fixVersionPrefix: "", rules: [] })

/**
 * Read-only view over the repository configuration file.
 */
export class Configuration {
  readonly appId: number
  readonly installationId: number
  readonly repositories: readonly RepositoryConfig[]

  constructor(data: z.infer<typeof configurationSchema>) {
    this.appId = data.appId
    this.installationId = data.installationId
    this.repositories = data.repositories
  }

  /** Every configured (destination, source) pair, with source owner/repo defaulted. */
  syncPairs(): SyncPair[] {
    const pairs: SyncPair[] = []
    for (const repo of this.repositories) {
      for (const branch of repo.branches) {
        const syncFrom = branch.syncFrom
        if (!syncFrom || syncFrom.branch === "") continue
        pairs.push({
          destination: { owner: repo.owner, repo: repo.repo, branch: branch.name },
          source: {
            owner: syncFrom.owner || repo.owner,
            repo: syncFrom.repo || repo.repo,
            branch: syncFrom.branch,
          },
        })
      }
    }
    return pairs
  }

  /** Destinations configured to follow `owner/repo:branch`. */
  branchesSyncedFrom(owner: string, repo: string, branch: string): BranchReference[] {
    const from: BranchReference = { owner, repo, branch }
    return this.syncPairs()
      .filter((pair) => sameBranch(pair.source, from))
      .map((pair) => pair.destination)
  }

  repository(owner: string, repo: string): RepositoryConfig | undefined {
    return this.repositories.find((r) => r.owner === owner && r.repo === repo)
  }

  jiraFor(owner: string, repo: string): JiraConfig {
    return this.repository(owner, repo)?.jira ?? emptyJiraConfig()
  }

  branchFor(owner: string, repo: string, name: string): BranchConfig {
    const found = this.repository(owner, repo)?.branches.find((b) => b.name === name)
    return found ?? { name, version: "" }
  }
}

export const parseConfiguration = (text: string): Configuration => {
  const raw: unknown = parseYaml(text)
  const result = configurationSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`)
  }
  return new Configuration(result.data)
}

export const loadConfiguration = async (filename: string): Promise<Configuration> => {
  const text = await readFile(filename, "utf8")
  return parseConfiguration(text)
}
