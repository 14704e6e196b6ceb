import { readFile } from "node:fs/promises"
import { serve } from "@hono/node-server"
import dotenv from "dotenv"
import { createApp } from "../api/index"
import { loadConfiguration } from "@/lib/configuration"
import { createEngine } from "@/lib/engine"
import { GitHubAppAuth } from "@/lib/github-app"
import { GitHubClient } from "@/lib/github-client"
import { JiraClient } from "@/lib/jira-client"
import { log } from "@/lib/logger"
import { loadSettings } from "@/lib/settings"

dotenv.config()

const main = async () => {
  const settings = loadSettings()
  const config = await loadConfiguration(settings.configFile)
  const jiraToken = (await readFile(settings.jiraTokenFile, "utf8")).trim()
  const privateKey = await readFile(settings.privateKeyFile, "utf8")

  const auth = new GitHubAppAuth({
    appId: config.appId,
    installationId: config.installationId,
    privateKey,
  })
  const engine = createEngine({
    config,
    github: new GitHubClient(auth),
    jira: new JiraClient(settings.jiraEndpoint, jiraToken),
    syncIntervalMs: settings.syncIntervalMs,
  })

  const app = createApp({
    reactor: engine.reactor,
    status: engine.status,
    reconciler: engine.reconciler,
  })
  const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
    log.info("Listening", { port: info.port, repositories: config.repositories.length })
  })

  engine.reconciler.start()

  const shutdown = async (signal: string) => {
    log.info("Shutting down", { signal })
    server.close()
    await engine.reconciler.stop()
    process.exit(0)
  }
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => log.error("Failed to shut down", error))
  }
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)
}

main().catch((error: unknown) => {
  log.error("Failed to start", error)
  process.exit(1)
})
