import type { BranchSyncer } from "./branch-sync"
import { formatBranch, type Configuration } from "./configuration"
import { log } from "./logger"

export interface ReconcileStats {
  lastRun: Date | null
  passes: number
  synced: number
  failed: number
}

/**
 * Periodically re-applies every configured sync pair so missed or failed
 * push deliveries converge. The first pass runs on `start`; a tick that fires
 * while a pass is still running is skipped.
 */
export class Reconciler {
  private timer: ReturnType<typeof setInterval> | null = null
  private running: Promise<void> | null = null
  private stats: ReconcileStats = { lastRun: null, passes: 0, synced: 0, failed: 0 }

  constructor(
    private readonly config: Configuration,
    private readonly syncer: BranchSyncer,
    private readonly intervalMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** One pass over all pairs. Failures are logged and never abort the pass. */
  async runPass(): Promise<void> {
    const pairs = this.config.syncPairs()
    let synced = 0
    let failed = 0

    for (const { destination, source } of pairs) {
      try {
        await this.syncer.sync(destination, source)
        synced++
      } catch (error) {
        failed++
        log.error("Failed to sync branch", error, {
          branch: formatBranch(destination),
          source: formatBranch(source),
        })
      }
    }

    this.stats = {
      lastRun: this.now(),
      passes: this.stats.passes + 1,
      synced: this.stats.synced + synced,
      failed: this.stats.failed + failed,
    }
    log.info("Reconcile pass finished", { pairs: pairs.length, synced, failed })
  }

  private tick(): void {
    if (this.running) {
      log.debug("Previous reconcile pass still running, skipping tick")
      return
    }
    this.running = this.runPass()
      .catch((error: unknown) => log.error("Reconcile pass failed", error))
      .finally(() => {
        this.running = null
      })
  }

  start(): void {
    if (this.timer) return
    log.info("Starting reconciler", { intervalMs: this.intervalMs })
    this.timer = setInterval(() => this.tick(), this.intervalMs)
    this.tick()
  }

  /** Stop scheduling passes and wait for the one in flight, if any. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.running
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  getStats(): ReconcileStats {
    return { ...this.stats }
  }
}
