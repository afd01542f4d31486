/**
 * Intent Classification Prompt
 *
 * Routes a user turn to exactly one task handler (or none).
 */

import { createSystemMessage, createUserMessage, formatHistory } from "../../llm/messages";
import type { ChatMessage } from "../../llm/types";
import { CLASSIFIER_HISTORY_LIMIT } from "../constants";

export const INTENT_CLASSIFICATION_PROMPT = `You are an intent classifier for a document assistant.

Classify the user's latest message into ONE of these intents:
- "qa": The user asks a question that should be answered from documents or general knowledge.
- "summarization": The user wants one or more documents (or the conversation) summarized.
- "calculation": The user wants a number computed: totals, differences, percentages, arithmetic over document amounts.
- "unknown": The message fits none of the above (greetings, chit-chat, requests the assistant cannot perform).

KEY DECISION RULES:
- Use the conversation history to resolve follow-ups ("and the second one?" inherits the previous intent).
- Prefer "calculation" whenever the answer is a computed number, even if documents must be read first.
- Prefer "summarization" when the user asks for an overview, digest or key points.
- Use "unknown" only when no handler could make progress.

Return:
- intent_type: one of "qa", "summarization", "calculation", "unknown"
- confidence: a number between 0 and 1
- reasoning: one or two sentences explaining the decision`;

export function renderIntentClassificationPrompt(userInput: string, history: ChatMessage[]): ChatMessage[] {
  const conversationHistory = formatHistory(history, CLASSIFIER_HISTORY_LIMIT);

  return [
    createSystemMessage(INTENT_CLASSIFICATION_PROMPT),
    createUserMessage(`Conversation history:
${conversationHistory || "No previous conversation."}

User message:
"${userInput}"`),
  ];
}
