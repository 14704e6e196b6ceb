import { decodeWebhookEvent } from "@/lib/webhook-validation"
import { logWebhookPath } from "./logging"
import type { Reactor } from "./types"

/**
 * Decode one delivery and hand it to the reactor. Deliveries the bot does
 * not react to resolve without effect.
 */
export async function dispatchWebhookEvent(
  reactor: Reactor,
  event: string,
  rawBody: string,
  deliveryId?: string,
): Promise<void> {
  const decoded = decodeWebhookEvent(event, rawBody)
  if (!decoded) {
    logWebhookPath("ignored", 0, { event, deliveryId })
    return
  }

  logWebhookPath(`dispatch ${decoded.kind}`, 0, { event, deliveryId })
  await reactor.handle(decoded)
}
