/**
 * Conversation State
 *
 * One instance per session, owned by the turn router and checkpointed after
 * every node. Nodes never mutate state; they return a StateUpdate that
 * mergeStateUpdate folds in:
 * - messages: id-aware append (a message already present is left alone)
 * - actionsTaken: concatenation
 * - every other field: overwrite
 */

import { z } from "zod";
import { chatMessageSchema, type ChatMessage } from "../llm/types";
import {
  INTENT_TYPES,
  answerResponseSchema,
  calculationResponseSchema,
  summarizationResponseSchema,
  userIntentSchema,
  type TaskResponse,
  type UserIntent,
} from "./schemas";

export const NODE_NAMES = [
  "classify_intent",
  "qa_agent",
  "summarization_agent",
  "calculation_agent",
  "update_memory",
] as const;
export type NodeName = typeof NODE_NAMES[number];
export type TaskNodeName = Exclude<NodeName, "classify_intent" | "update_memory">;

export const NEXT_STEPS = ["classify_intent", ...INTENT_TYPES, "update_memory", "end"] as const;
export type NextStep = typeof NEXT_STEPS[number];

export const conversationStateSchema = z.object({
  userInput: z.string().nullable(),
  messages: z.array(chatMessageSchema),
  intent: userIntentSchema.nullable(),
  nextStep: z.enum(NEXT_STEPS),
  conversationSummary: z.string(),
  activeDocuments: z.array(z.string()),
  currentResponse: z
    .union([answerResponseSchema, summarizationResponseSchema, calculationResponseSchema])
    .nullable(),
  toolsUsed: z.array(z.string()),
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  actionsTaken: z.array(z.enum(NODE_NAMES)),
});

export type ConversationState = {
  userInput: string | null;
  messages: ChatMessage[];
  intent: UserIntent | null;
  nextStep: NextStep;
  conversationSummary: string;
  activeDocuments: string[];
  currentResponse: TaskResponse | null;
  toolsUsed: string[];
  readonly sessionId: string;
  readonly userId: string;
  actionsTaken: NodeName[];
};

/**
 * What a node may change. Identity fields are not part of it.
 */
export type StateUpdate = Partial<Omit<ConversationState, "sessionId" | "userId">>;

export function createInitialState(sessionId: string, userId: string): ConversationState {
  return {
    userInput: null,
    messages: [],
    intent: null,
    nextStep: "classify_intent",
    conversationSummary: "",
    activeDocuments: [],
    currentResponse: null,
    toolsUsed: [],
    sessionId,
    userId,
    actionsTaken: [],
  };
}

export function mergeMessages(existing: ChatMessage[], incoming: ChatMessage[]): ChatMessage[] {
  const seen = new Set(existing.map(m => m.id));
  const merged = [...existing];
  for (const message of incoming) {
    if (seen.has(message.id)) continue;
    seen.add(message.id);
    merged.push(message);
  }
  return merged;
}

export function mergeActions(existing: NodeName[], incoming: NodeName[]): NodeName[] {
  return [...existing, ...incoming];
}

export function mergeStateUpdate(state: ConversationState, update: StateUpdate): ConversationState {
  const { messages, actionsTaken, ...overwrites } = update;
  return {
    ...state,
    ...overwrites,
    messages: messages ? mergeMessages(state.messages, messages) : state.messages,
    actionsTaken: actionsTaken ? mergeActions(state.actionsTaken, actionsTaken) : state.actionsTaken,
  };
}

/**
 * Start a new turn on top of the previous turn's state. History, summary and
 * active documents carry over; everything describing the last turn resets.
 */
export function beginTurn(state: ConversationState, userInput: string): ConversationState {
  return {
    ...state,
    userInput,
    intent: null,
    nextStep: "classify_intent",
    currentResponse: null,
    toolsUsed: [],
    actionsTaken: [],
  };
}

export function dedupeDocumentIds(ids: readonly string[]): string[] {
  return Array.from(new Set(ids));
}
