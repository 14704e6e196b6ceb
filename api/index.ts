import { Hono } from "hono"
import { isDecodeError } from "@/lib/errors"
import { log } from "@/lib/logger"
import type { Reconciler } from "@/lib/reconciler"
import type { StatusDocument } from "@/lib/status-store"
import { logWebhookReceived } from "@/lib/webhooks/logging"
import { dispatchWebhookEvent } from "@/lib/webhooks/processor"
import type { Reactor } from "@/lib/webhooks/types"

export interface AppDeps {
  reactor: Reactor
  status: () => Promise<StatusDocument>
  reconciler: Pick<Reconciler, "isRunning" | "getStats">
}

export const createApp = ({ reactor, status, reconciler }: AppDeps) => {
  const app = new Hono()

  app.get("/healthz", (c) => {
    const { lastRun, ...stats } = reconciler.getStats()
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      reconciler: {
        running: reconciler.isRunning(),
        lastRun: lastRun?.toISOString() ?? null,
        ...stats,
      },
    })
  })

  app.get("/status", async (c) => {
    return c.json(await status())
  })

  // GitHub webhook deliveries; the event name travels in a header
  app.all("*", async (c) => {
    const rawBody = await c.req.text()
    if (rawBody.length === 0) {
      return c.body(null, 501)
    }

    const event = c.req.header("x-github-event") ?? ""
    const delivery = c.req.header("x-github-delivery") ?? null
    logWebhookReceived(event, delivery, Buffer.byteLength(rawBody))

    try {
      await dispatchWebhookEvent(reactor, event, rawBody, delivery ?? undefined)
      return c.body(null, 204)
    } catch (error) {
      log.error("Failed to handle webhook", error, { event, deliveryId: delivery })
      const message = error instanceof Error ? error.message : String(error)
      if (isDecodeError(error)) {
        return c.json({ error: message }, 400)
      }
      return c.json({ error: message }, 500)
    }
  })

  return app
}
