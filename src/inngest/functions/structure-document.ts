/**
 * @fileoverview Structure Document Function
 *
 * Builds a document's outline in the background:
 * 1. Validate the request payload
 * 2. Run the structure build in one durable step
 * 3. Emit `document/structure.completed`
 *
 * Model calls retry inside the build, so the function itself does not. Any
 * failure except a precondition error marks the document FAILED with the
 * error message.
 *
 * @module inngest/functions/structure-document
 */

import { NonRetriableError } from "inngest"
import { inngest } from "../client"
import { structureRequestedPayload, type StructureRequestedPayload } from "../types"
import { documentRepository } from "@/db/queries/documents"
import { nodeRepository } from "@/db/queries/document-nodes"
import { createStructureGenerator } from "@/agents/structure-generator"
import { InvalidStateError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import {
  createStructureBuilder,
  loadChunkingConfig,
  loadLlmRetryConfig,
  type DocumentRepository,
  type StructureBuilder,
  type StructureBuildSummary,
  type StructureOptions,
} from "@/lib/document-structure"

export interface StructureJobDeps {
  builder: StructureBuilder
  documents: DocumentRepository
}

function defaultDeps(): StructureJobDeps {
  return {
    documents: documentRepository,
    builder: createStructureBuilder({
      documents: documentRepository,
      nodes: nodeRepository,
      generator: createStructureGenerator({ retry: loadLlmRetryConfig() }),
      chunking: loadChunkingConfig(),
    }),
  }
}

function optionsFrom(payload: StructureRequestedPayload): Partial<StructureOptions> {
  const options: Partial<StructureOptions> = {}
  if (payload.model) options.model = payload.model
  if (payload.profile) options.profile = payload.profile
  if (payload.granularity) options.granularity = payload.granularity
  return options
}

/**
 * Build the structure and record a failure on the document.
 */
export async function runStructureJob(
  payload: StructureRequestedPayload,
  deps: StructureJobDeps = defaultDeps()
): Promise<StructureBuildSummary> {
  try {
    return await deps.builder.buildStructure(payload.documentId, optionsFrom(payload))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error("Structure job failed", { documentId: payload.documentId, error: message })

    if (!(error instanceof InvalidStateError)) {
      await deps.documents.updateStatus(payload.documentId, "FAILED", message)
    }
    throw new NonRetriableError(message, { cause: error })
  }
}

export const structureDocument = inngest.createFunction(
  {
    id: "structure-document",
    name: "Structure Document",
    concurrency: { limit: 2 },
    retries: 0,
  },
  { event: "document/structure.requested" },
  async ({ event, step }) => {
    const parsed = structureRequestedPayload.safeParse(event.data)
    if (!parsed.success) {
      throw new NonRetriableError(`Invalid structure request: ${parsed.error.message}`)
    }
    const payload = parsed.data

    const summary = await step.run("build-structure", () => runStructureJob(payload))

    await step.sendEvent("structure-completed", {
      name: "document/structure.completed",
      data: summary,
    })

    return summary
  }
)
