/**
 * Inference Provider Contract
 *
 * The narrow surface the turn router needs from a language model:
 * - a tool-bound model for the task handlers' reasoning loop
 * - a structured-output call for classification and memory consolidation
 *
 * Messages are the same objects that live in conversation state, so they
 * carry stable ids and can be checkpointed as JSON.
 */

import { z } from "zod";
import type { ToolDefinition } from "../tools/types";

export const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.string(),
});

export type ToolCall = z.infer<typeof toolCallSchema>;

export const chatMessageSchema = z.discriminatedUnion("role", [
  z.object({ id: z.string(), role: z.literal("system"), content: z.string() }),
  z.object({ id: z.string(), role: z.literal("user"), content: z.string() }),
  z.object({
    id: z.string(),
    role: z.literal("assistant"),
    content: z.string(),
    toolCalls: z.array(toolCallSchema).default([]),
  }),
  z.object({
    id: z.string(),
    role: z.literal("tool"),
    content: z.string(),
    toolCallId: z.string(),
    name: z.string(),
  }),
]);

export type ChatMessage = z.infer<typeof chatMessageSchema>;

export type AssistantReply = {
  content: string;
  toolCalls: ToolCall[];
};

/**
 * JSON-schema form of a response type, as handed to the model.
 */
export type StructuredSchema = {
  name: string;
  description: string;
  jsonSchema: Record<string, unknown>;
};

export type StructuredRequest = {
  messages: ChatMessage[];
  schema: StructuredSchema;
  model?: string;
};

export type BindToolsOptions = {
  model?: string;
};

export interface ToolBoundModel {
  readonly toolNames: string[];
  invoke(messages: ChatMessage[]): Promise<AssistantReply>;
}

export interface InferenceProvider {
  bindTools(tools: readonly ToolDefinition[], options?: BindToolsOptions): ToolBoundModel;
  /**
   * Returns the parsed JSON value the model produced. Throws
   * StructuredOutputError when the output is not JSON at all; conformance to
   * the schema is checked by the caller.
   */
  generateStructured(request: StructuredRequest): Promise<unknown>;
}
