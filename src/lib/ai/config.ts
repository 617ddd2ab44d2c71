import { gateway } from 'ai'

/** Available models via Vercel AI Gateway */
export const MODELS = {
  fast: 'anthropic/claude-haiku-4.5',
  balanced: 'anthropic/claude-sonnet-4',
  best: 'anthropic/claude-sonnet-4.5',
} as const

export type ModelTier = keyof typeof MODELS

/** Per-agent model configuration */
export const AGENT_MODELS = {
  structurer: MODELS.fast,
} as const

export type AgentType = keyof typeof AGENT_MODELS

/**
 * Resolve a model id from structure options. Tier names ("fast", "best")
 * map through MODELS; anything else is passed to the gateway as-is.
 */
export function resolveModel(modelId: string) {
  const tier = Object.keys(MODELS).find((key): key is ModelTier => key === modelId)
  return gateway(tier ? MODELS[tier] : modelId)
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 8192,
} as const
