import { formatBranch, type Configuration } from "./configuration"
import { log } from "./logger"
import { setFixVersion, type StatusDocument, type StatusStore } from "./status-store"
import type { VersionCache } from "./version-cache"

/**
 * The `/status` document: the stored sync status of every branch plus the
 * fix-version a pull request merged into each versioned branch would get.
 * A branch whose version cannot be computed is logged and left out.
 */
export const collectStatus = async (
  config: Configuration,
  store: StatusStore,
  versions: VersionCache,
): Promise<StatusDocument> => {
  const doc = store.snapshot()

  for (const repository of config.repositories) {
    const { owner, repo } = repository
    for (const branch of repository.branches) {
      if (branch.version === "") continue
      const name = formatBranch({ owner, repo, branch: branch.name })
      try {
        const next = await versions.nextVersion(owner, repo, branch.version)
        setFixVersion(doc, name, (repository.jira?.fixVersionPrefix ?? "") + next)
      } catch (error) {
        log.error("Failed to get fix version", error, { branch: name })
      }
    }
  }

  return doc
}
