import { createSystemMessage } from "../../llm/messages";
import type { ChatMessage } from "../../llm/types";

export const MEMORY_SUMMARY_PROMPT = `You maintain the running memory of a conversation between a user and a document assistant.

Read the conversation and return:
- summary: a concise summary of the conversation so far - what the user asked, what was found or computed, and any open threads
- document_ids: the ids of the documents relevant to the user's LAST message (empty when none are)

Keep the summary under 150 words. Do not invent documents that were never mentioned.`;

export function renderMemorySummaryPrompt(history: ChatMessage[], previousSummary: string): ChatMessage[] {
  const system = previousSummary
    ? `${MEMORY_SUMMARY_PROMPT}\n\nPrevious summary:\n${previousSummary}`
    : MEMORY_SUMMARY_PROMPT;

  return [createSystemMessage(system), ...history];
}
