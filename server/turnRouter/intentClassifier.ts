/**
 * Intent Classifier
 *
 * Purpose:
 * Maps the user's message plus conversation history to a UserIntent. The
 * router routes on intent_type directly, so anything that does not conform
 * to the schema aborts the turn instead of being coerced to a default.
 */

import { renderIntentClassificationPrompt } from "../config/prompts";
import type { ChatMessage, InferenceProvider } from "../llm/types";
import { ClassificationFailure, StructuredOutputError, ValidationError } from "../utils/errorHandler";
import { RESPONSE_SCHEMAS, type UserIntent } from "./schemas";
import type { ConversationState } from "./state";
import type { GraphNode } from "./types";

export type ClassifyIntentOptions = {
  model?: string;
};

export async function classifyIntent(
  inference: InferenceProvider,
  userInput: string,
  history: ChatMessage[],
  options: ClassifyIntentOptions = {},
): Promise<UserIntent> {
  const schema = RESPONSE_SCHEMAS.userIntent;

  let raw: unknown;
  try {
    raw = await inference.generateStructured({
      messages: renderIntentClassificationPrompt(userInput, history),
      schema: schema.structured,
      model: options.model,
    });
  } catch (err) {
    if (err instanceof StructuredOutputError) {
      throw new ClassificationFailure(`Intent classification failed: ${err.message}`, {
        issues: err.issues,
        cause: err,
      });
    }
    throw err;
  }

  const result = schema.create(raw);
  if (!result.success) {
    throw new ClassificationFailure(result.error, { issues: result.issues });
  }
  return result.data;
}

export function requireUserInput(state: ConversationState): string {
  const input = state.userInput;
  if (!input || !input.trim()) {
    throw new ValidationError("userInput is required");
  }
  return input;
}

export const classifyIntentNode: GraphNode = async (state, ctx) => {
  const userInput = requireUserInput(state);
  const intent = await classifyIntent(ctx.inference, userInput, state.messages, {
    model: ctx.models.classification,
  });

  ctx.logger.info(`[IntentClassifier] ${intent.intent_type} (confidence ${intent.confidence})`, {
    node: "classify_intent",
    intent: intent.intent_type,
  });

  return {
    intent,
    nextStep: intent.intent_type,
    actionsTaken: ["classify_intent"],
  };
};
