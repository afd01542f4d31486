/**
 * Centralized Prompt Configuration
 *
 * Structure:
 * - intentClassification.ts: routing a turn to a task handler
 * - tasks.ts: QA, summarization and calculation handler prompts
 * - memory.ts: running conversation summary
 */

export * from "./intentClassification";
export * from "./tasks";
export * from "./memory";
