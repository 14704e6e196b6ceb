import { BranchSyncer } from "./branch-sync"
import type { Configuration } from "./configuration"
import type { SourceControl } from "./github-client"
import { JiraCheck } from "./jira-check"
import type { IssueTracker } from "./jira-client"
import { Reconciler } from "./reconciler"
import { collectStatus } from "./status-report"
import { StatusStore, type StatusDocument } from "./status-store"
import { VersionCache } from "./version-cache"
import { createReactor } from "./webhooks/reactor"
import type { Reactor } from "./webhooks/types"

export interface EngineOptions {
  config: Configuration
  github: SourceControl
  jira: IssueTracker
  syncIntervalMs: number
  now?: () => Date
}

export interface Engine {
  config: Configuration
  store: StatusStore
  versions: VersionCache
  syncer: BranchSyncer
  jiraCheck: JiraCheck
  reactor: Reactor
  reconciler: Reconciler
  status(): Promise<StatusDocument>
}

/** Build the shared state and services one running bot instance owns. */
export const createEngine = ({ config, github, jira, syncIntervalMs, now }: EngineOptions): Engine => {
  const store = new StatusStore(now)
  const versions = new VersionCache(github)
  const syncer = new BranchSyncer(github, store)
  const jiraCheck = new JiraCheck(github, jira, versions)
  const reactor = createReactor({ config, github, syncer, versions, jiraCheck })
  const reconciler = new Reconciler(config, syncer, syncIntervalMs, now)

  return {
    config,
    store,
    versions,
    syncer,
    jiraCheck,
    reactor,
    reconciler,
    status: () => collectStatus(config, store, versions),
  }
}
