/**
 * Task Handler Prompts
 *
 * One system prompt per task kind. The rendered sequence is
 * system prompt → prior conversation → the user's current message.
 */

import { createSystemMessage, createUserMessage } from "../../llm/messages";
import type { ChatMessage } from "../../llm/types";
import type { TaskIntent } from "../../turnRouter/schemas";

export type TaskKind = TaskIntent;

export type PromptInput = {
  input: string;
  history: ChatMessage[];
};

export type PromptTemplate = (input: PromptInput) => ChatMessage[];

const SHARED_TOOL_GUIDANCE = `TOOLS:
- document_search: find documents by keyword, by type, or by amount range
- document_reader: read the full content of a document by id
- document_statistics: counts and totals across all documents
- calculator: evaluate an arithmetic expression exactly

Never guess document contents or numbers - look them up with the tools first.`;

export const QA_SYSTEM_PROMPT = `You are a document assistant answering questions.

${SHARED_TOOL_GUIDANCE}

ANSWER RULES:
- Cite every document you relied on by its id in "sources".
- If you could not find supporting documents, say so and keep confidence below 0.7.
- A confidence of 0.7 or higher REQUIRES at least one source.`;

export const SUMMARIZATION_SYSTEM_PROMPT = `You are a document assistant producing summaries.

${SHARED_TOOL_GUIDANCE}

SUMMARY RULES:
- Read each document before summarizing it.
- "original_length" is the total character count of the material you summarized.
- List the distinct key points; list every summarized document id in "document_ids".`;

export const CALCULATION_SYSTEM_PROMPT = `You are a document assistant performing calculations.

${SHARED_TOOL_GUIDANCE}

CALCULATION RULES:
- Look up every figure in the documents before computing with it.
- Use the calculator tool for the arithmetic; do not compute in your head.
- Report the final expression, its numeric result, a step-by-step explanation, and units when they apply.`;

export const TASK_SYSTEM_PROMPTS: Record<TaskKind, string> = {
  qa: QA_SYSTEM_PROMPT,
  summarization: SUMMARIZATION_SYSTEM_PROMPT,
  calculation: CALCULATION_SYSTEM_PROMPT,
};

function createTaskTemplate(kind: TaskKind): PromptTemplate {
  return ({ input, history }) => [
    createSystemMessage(TASK_SYSTEM_PROMPTS[kind]),
    ...history,
    createUserMessage(input),
  ];
}

export const TASK_PROMPT_TEMPLATES: Record<TaskKind, PromptTemplate> = {
  qa: createTaskTemplate("qa"),
  summarization: createTaskTemplate("summarization"),
  calculation: createTaskTemplate("calculation"),
};
