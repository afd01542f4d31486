/**
 * Application Constants
 *
 * Loop budgets and limits used across the turn router.
 */

import * as path from "path";

export const REASONING_LOOP_LIMITS = {
  /**
   * Model calls a task handler may make while the model keeps requesting
   * tools. Running out without a final answer fails the handler.
   */
  MAX_TOOL_STEPS: 8,

  /**
   * Structured-output attempts per handler. Each rejected candidate is fed
   * back to the model with the validation message before the next attempt.
   */
  MAX_VALIDATION_ATTEMPTS: 2,
} as const;

/**
 * Number of prior user/assistant messages rendered into the intent
 * classification prompt.
 */
export const CLASSIFIER_HISTORY_LIMIT = 10;

/**
 * Confidence at or above which an answer must cite at least one source.
 */
export const HIGH_CONFIDENCE_THRESHOLD = 0.7;

export const DOCUMENT_CORPUS_PATH = path.join(process.cwd(), "server", "data", "documents.json");

export const DOCUMENT_SEARCH_LIMITS = {
  MAX_RESULTS: 5,
  PREVIEW_LENGTH: 160,
} as const;
