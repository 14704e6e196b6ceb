import { formatBranch, type BranchReference } from "./configuration"
import type { SourceControl } from "./github-client"
import { log } from "./logger"
import type { StatusStore } from "./status-store"

const causeText = (error: unknown) => (error instanceof Error ? error.message : String(error))

/**
 * Fast-forwards destination branches to their source branch and records the
 * outcome in the status store. Calling `sync` again when nothing moved only
 * reads both refs.
 */
export class BranchSyncer {
  constructor(
    private readonly github: SourceControl,
    private readonly status: StatusStore,
  ) {}

  private fail(dest: BranchReference, message: string, cause: unknown): Error {
    const error = new Error(message, { cause })
    this.status.update(formatBranch(dest), "Error", message)
    return error
  }

  async sync(dest: BranchReference, src: BranchReference): Promise<void> {
    const destName = formatBranch(dest)
    const srcName = formatBranch(src)

    let sourceSha: string
    try {
      sourceSha = await this.github.getRef(src.owner, src.repo, `heads/${src.branch}`)
    } catch (error) {
      throw this.fail(dest, `failed to get source ref: ${causeText(error)}`, error)
    }

    let destinationSha: string
    try {
      destinationSha = await this.github.getRef(dest.owner, dest.repo, `heads/${dest.branch}`)
    } catch (error) {
      throw this.fail(dest, `failed to get destination ref: ${causeText(error)}`, error)
    }

    log.debug("Checking branch sync", {
      branch: destName,
      head: destinationSha,
      source: srcName,
      sourceHead: sourceSha,
    })

    if (destinationSha !== sourceSha) {
      log.info("Updating branch", { branch: destName, from: destinationSha, to: sourceSha })
      try {
        await this.github.updateRef(dest.owner, dest.repo, `heads/${dest.branch}`, sourceSha)
      } catch (error) {
        throw this.fail(dest, `failed to update ${destName}: ${causeText(error)}`, error)
      }
    }

    this.status.update(destName, "Synced", `synced from ${srcName}, commit: ${sourceSha}`)
  }
}
