/**
 * Neon Serverless Database Client
 *
 * Drizzle ORM client connected to a Neon PostgreSQL database via the
 * serverless HTTP driver. Each query is an independent HTTP request.
 *
 * @remarks
 * The HTTP driver has no interactive transactions. Each structure layer is
 * written with a single multi-row INSERT, which is atomic on its own.
 *
 * @see {@link https://neon.tech/docs/serverless/serverless-driver} Neon Serverless Driver
 * @see {@link https://orm.drizzle.team/docs/get-started-postgresql#neon} Drizzle + Neon Setup
 *
 * @module db/client
 */

import { neon } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-http"
import * as schema from "./schema"

const databaseUrl = process.env.DATABASE_URL
if (!databaseUrl) {
  throw new Error("DATABASE_URL is not set")
}

const sql = neon(databaseUrl)

/**
 * Pre-configured Drizzle ORM database client instance.
 *
 * @example
 * ```typescript
 * import { db } from "@/db/client"
 *
 * const nodes = await db
 *   .select()
 *   .from(documentNodes)
 *   .where(eq(documentNodes.documentId, documentId))
 * ```
 */
export const db = drizzle(sql, { schema })

export type Database = typeof db
