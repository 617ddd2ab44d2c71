/**
 * @fileoverview Reusable column helper objects for Drizzle ORM schema composition.
 *
 * Spread into table definitions:
 *
 * @example
 * import { pgTable, text } from "drizzle-orm/pg-core"
 * import { primaryId, timestamps } from "./_columns"
 *
 * export const documents = pgTable("documents", {
 *   ...primaryId,      // Adds: id (UUID, primary key, auto-generated)
 *   ...timestamps,     // Adds: createdAt, updatedAt (auto-managed)
 *   text: text("text"),
 * })
 *
 * @module db/_columns
 * @see {@link https://orm.drizzle.team/docs/column-types} Drizzle column types documentation
 */

import { timestamp, uuid } from "drizzle-orm/pg-core"

/**
 * Standard timestamp columns for tracking record creation and modification times.
 *
 * @remarks
 * The `updatedAt` column uses Drizzle's `$onUpdate()` callback which triggers
 * automatically when using Drizzle's update operations. Raw SQL updates
 * bypassing Drizzle will NOT trigger it.
 */
export const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow()
    .$onUpdate(() => new Date()),
}

/**
 * Primary key column using UUID v4 generated by `gen_random_uuid()`.
 */
export const primaryId = {
  id: uuid("id").primaryKey().defaultRandom(),
}
