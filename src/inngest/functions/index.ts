/**
 * @fileoverview Inngest Function Registry
 *
 * Barrel export for all Inngest functions. The serve handler imports
 * from this file to register all functions with Inngest.
 *
 * @module inngest/functions
 */

import { structureDocument } from "./structure-document"

/**
 * All registered Inngest functions.
 */
export const functions = [structureDocument]
