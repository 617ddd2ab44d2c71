/**
 * @fileoverview Worker entry point
 *
 * Serves the Inngest functions over HTTP at `/api/inngest`. Environment is
 * loaded from `.env.local` before any module that reads it.
 *
 * @module server
 */

import { createServer } from "node:http"
import { config } from "dotenv"

config({ path: ".env.local" })

async function main(): Promise<void> {
  const { initInstrumentation } = await import("./instrument")
  initInstrumentation()

  const { serve } = await import("inngest/node")
  const { inngest } = await import("./inngest/client")
  const { functions } = await import("./inngest/functions")
  const { logger } = await import("./lib/logger")

  const port = Number(process.env.PORT ?? 3000)
  const server = createServer(serve({ client: inngest, functions }))

  server.listen(port, () => {
    logger.info("Inngest worker listening", { port, functions: functions.length })
  })
}

main().catch((error: unknown) => {
  console.error("Worker failed to start", error)
  process.exit(1)
})
