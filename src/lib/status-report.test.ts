import { afterEach, describe, expect, it, vi } from "vitest"
import { log } from "./logger"
import { collectStatus } from "./status-report"
import { StatusStore } from "./status-store"
import { createFakeGitHub, makeConfiguration } from "./test-helpers"
import { VersionCache } from "./version-cache"

const NOW = "2024-03-01T00:00:00.000Z"

const setup = () => {
  const { github } = createFakeGitHub({
    tags: { "acme/widget": ["refs/tags/v1.4.0", "refs/tags/v1.4.1"] },
  })
  const store = new StatusStore(() => new Date(NOW))
  return { github, store, versions: new VersionCache(github), config: makeConfiguration() }
}

afterEach(() => vi.restoreAllMocks())

describe("collectStatus", () => {
  it("adds fix versions to the stored sync status", async () => {
    const { store, versions, config } = setup()
    store.update("acme/widget:release-1.4", "Synced", "synced from acme/widget:master, commit: m1")

    expect(await collectStatus(config, store, versions)).toEqual({
      branches: [
        {
          branch: "acme/widget:release-1.4",
          fixVersion: "widget-1.4.2",
          syncStatus: {
            status: "Synced",
            message: "synced from acme/widget:master, commit: m1",
            lastHeartbeatTime: NOW,
            lastTransitionTime: NOW,
          },
        },
      ],
    })
  })

  it("lists versioned branches that were never synced", async () => {
    const { store, versions, config } = setup()

    expect(await collectStatus(config, store, versions)).toEqual({
      branches: [{ branch: "acme/widget:release-1.4", fixVersion: "widget-1.4.2" }],
    })
  })

  it("leaves out fix versions that cannot be computed", async () => {
    const { github, store, versions, config } = setup()
    const error = vi.spyOn(log, "error").mockImplementation(() => {})
    github.listMatchingRefs.mockRejectedValueOnce(new Error("tags down"))

    expect(await collectStatus(config, store, versions)).toEqual({ branches: [] })
    expect(error).toHaveBeenCalledWith("Failed to get fix version", expect.any(Error), {
      branch: "acme/widget:release-1.4",
    })
  })
})
