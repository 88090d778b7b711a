/**
 * Model used by the stateless fallback completion.
 *
 * Precedence:
 *  1) OPENAI_DEFAULT_MODEL
 *  2) OPENAI_MODEL (legacy)
 *  3) 'gpt-4o-mini' fallback
 */
export const DEFAULT_MODEL_FALLBACK = 'gpt-4o-mini'

export function getDefaultModelName(env: NodeJS.ProcessEnv = process.env): string {
  return env.OPENAI_DEFAULT_MODEL?.trim() || env.OPENAI_MODEL?.trim() || DEFAULT_MODEL_FALLBACK
}
