export type SyncState = "Synced" | "Error"

export interface BranchSyncStatus {
  status: SyncState
  message: string
  lastHeartbeatTime: string
  lastTransitionTime: string
}

export interface BranchStatus {
  branch: string
  fixVersion?: string
  syncStatus?: BranchSyncStatus
}

export interface StatusDocument {
  branches: BranchStatus[]
}

/** Add or replace the fix-version of `branch` in a status document. */
export const setFixVersion = (doc: StatusDocument, branch: string, fixVersion: string): void => {
  const existing = doc.branches.find((b) => b.branch === branch)
  if (existing) {
    existing.fixVersion = fixVersion
    return
  }
  doc.branches.push({ branch, fixVersion })
}

/**
 * Last known synchronization state of every destination branch. Entries are
 * created on the first sync attempt and live as long as the process.
 */
export class StatusStore {
  private readonly branches: BranchStatus[] = []

  constructor(private readonly now: () => Date = () => new Date()) {}

  snapshot(): StatusDocument {
    return { branches: structuredClone(this.branches) }
  }

  get(branch: string): BranchSyncStatus | undefined {
    const found = this.branches.find((b) => b.branch === branch)?.syncStatus
    return found ? { ...found } : undefined
  }

  /**
   * Record an observation. The heartbeat always moves; the transition time
   * only moves when the state or message changed.
   */
  update(branch: string, status: SyncState, message: string): void {
    const now = this.now().toISOString()
    const entry = this.branches.find((b) => b.branch === branch)

    if (!entry) {
      this.branches.push({
        branch,
        syncStatus: { status, message, lastHeartbeatTime: now, lastTransitionTime: now },
      })
      return
    }

    const current = entry.syncStatus
    if (!current) {
      entry.syncStatus = { status, message, lastHeartbeatTime: now, lastTransitionTime: now }
      return
    }
    if (current.status !== status || current.message !== message) {
      current.status = status
      current.message = message
      current.lastTransitionTime = now
    }
    current.lastHeartbeatTime = now
  }
}
