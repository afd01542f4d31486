/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for model selection in the turn router.
 *
 * MODEL TIERS:
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Use for: intent classification and memory consolidation, both single
 *            structured-output calls with small schemas.
 *
 * STANDARD_REASONING - gpt-4o
 *   Use for: the task handlers' tool-augmented reasoning loops.
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
} as const;

/**
 * Model assignments by graph node.
 */
export const MODEL_ASSIGNMENTS = {
  INTENT_CLASSIFICATION: LLM_MODELS.FAST_CLASSIFICATION,
  QA_AGENT: LLM_MODELS.STANDARD_REASONING,
  SUMMARIZATION_AGENT: LLM_MODELS.STANDARD_REASONING,
  CALCULATION_AGENT: LLM_MODELS.STANDARD_REASONING,
  MEMORY_UPDATE: LLM_MODELS.FAST_CLASSIFICATION,
} as const;
