/**
 * @fileoverview Inngest Client Configuration
 *
 * Singleton Inngest client. All durable workflow functions are created
 * with this client.
 *
 * @module inngest/client
 * @see {@link https://www.inngest.com/docs/reference/client/create}
 */

import { Inngest, EventSchemas } from "inngest"
import type { InngestEvents } from "./types"

/**
 * @example
 * ```typescript
 * import { inngest } from "@/inngest/client"
 *
 * await inngest.send({
 *   name: "document/structure.requested",
 *   data: { documentId },
 * })
 * ```
 */
export const inngest = new Inngest({
  id: "document-structure",
  schemas: new EventSchemas().fromRecord<InngestEvents>(),
})

export type InngestClient = typeof inngest
