import type { SourceControl } from "./github-client"
import { log } from "./logger"

const REF_VERSION_REGEX = /^refs\/tags\/v(\d+\.\d+)\.(\d+)$/

/**
 * Patch numbers seen for one `X.Y` stream. Kept sorted ascending with no
 * duplicates.
 */
export class PatchStream {
  private readonly patches: number[] = []

  private search(patch: number): number {
    let lo = 0
    let hi = this.patches.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.patches[mid] < patch) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    return lo
  }

  add(patch: number): void {
    const i = this.search(patch)
    if (this.patches[i] === patch) return
    this.patches.splice(i, 0, patch)
  }

  remove(patch: number): void {
    const i = this.search(patch)
    if (this.patches[i] === patch) {
      this.patches.splice(i, 1)
    }
  }

  next(): number {
    const last = this.patches.at(-1)
    return last === undefined ? 0 : last + 1
  }

  values(): readonly number[] {
    return this.patches
  }
}

export const parseVersionTag = (ref: string): { stream: string; patch: number } | null => {
  const match = REF_VERSION_REGEX.exec(ref)
  if (!match) return null
  const patch = Number.parseInt(match[2], 10)
  if (!Number.isSafeInteger(patch)) return null
  return { stream: match[1], patch }
}

/**
 * Per-repository cache of release tags, used to derive the next fix-version
 * of a release stream.
 *
 * The maps are only touched inside synchronous sections, so concurrent
 * handlers on the event loop never observe a half-updated stream. The tag
 * listing itself is awaited outside of them: two first accesses for the same
 * repository may both list tags, and merging the second result is a no-op.
 * A listing that started before `invalidate` is discarded when it lands.
 */
export class VersionCache {
  private synced = new Map<string, boolean>()
  private streams = new Map<string, PatchStream>()
  private generation = 0

  constructor(private readonly github: SourceControl) {}

  private streamKey(owner: string, repo: string, stream: string) {
    return `${owner}/${repo}:${stream}`
  }

  hasSynced(owner: string, repo: string): boolean {
    return this.synced.get(`${owner}/${repo}`) === true
  }

  /** Drop every stream and synced flag; the next lookup re-lists tags. */
  invalidate(): void {
    this.synced = new Map()
    this.streams = new Map()
    this.generation++
    log.debug("Version cache invalidated")
  }

  private addRefs(owner: string, repo: string, refs: string[]): void {
    for (const ref of refs) {
      const parsed = parseVersionTag(ref)
      if (!parsed) continue
      const key = this.streamKey(owner, repo, parsed.stream)
      let stream = this.streams.get(key)
      if (!stream) {
        stream = new PatchStream()
        this.streams.set(key, stream)
      }
      stream.add(parsed.patch)
    }
    this.synced.set(`${owner}/${repo}`, true)
  }

  private async init(owner: string, repo: string): Promise<boolean> {
    log.debug("Listing release tags", { repo: `${owner}/${repo}` })
    const generation = this.generation
    const refs = await this.github.listMatchingRefs(owner, repo, "tags/v")
    if (generation !== this.generation) {
      log.debug("Dropping tag listing from before invalidation", { repo: `${owner}/${repo}` })
      return false
    }
    this.addRefs(owner, repo, refs)
    return true
  }

  async nextVersion(owner: string, repo: string, stream: string): Promise<string> {
    // A listing dropped by a concurrent invalidation is retried once.
    if (!this.hasSynced(owner, repo) && !(await this.init(owner, repo))) {
      if (!(await this.init(owner, repo))) {
        throw new Error(`tag listing for ${owner}/${repo} was invalidated twice`)
      }
    }
    const patch = this.streams.get(this.streamKey(owner, repo, stream))?.next() ?? 0
    return `${stream}.${patch}`
  }
}
