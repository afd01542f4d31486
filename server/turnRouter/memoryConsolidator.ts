/**
 * Memory Consolidator
 *
 * Rewrites the rolling conversation summary and the active document set from
 * the full message history. Single structured-output call, no tools.
 */

import { renderMemorySummaryPrompt } from "../config/prompts";
import type { ChatMessage, InferenceProvider } from "../llm/types";
import { StructuredOutputError } from "../utils/errorHandler";
import { RESPONSE_SCHEMAS, type UpdateMemoryResponse } from "./schemas";
import { dedupeDocumentIds } from "./state";
import type { GraphNode } from "./types";

export async function consolidateMemory(
  inference: InferenceProvider,
  messages: ChatMessage[],
  previousSummary: string,
  options: { model?: string } = {},
): Promise<UpdateMemoryResponse> {
  const schema = RESPONSE_SCHEMAS.updateMemory;
  const raw = await inference.generateStructured({
    messages: renderMemorySummaryPrompt(messages, previousSummary),
    schema: schema.structured,
    model: options.model,
  });

  const result = schema.create(raw);
  if (!result.success) {
    throw new StructuredOutputError(schema.name, result.error, { issues: result.issues });
  }
  return result.data;
}

export const updateMemoryNode: GraphNode = async (state, ctx) => {
  const memory = await consolidateMemory(ctx.inference, state.messages, state.conversationSummary, {
    model: ctx.models.memory,
  });
  const activeDocuments = dedupeDocumentIds(memory.document_ids);

  ctx.logger.info(`[MemoryConsolidator] Summary updated, ${activeDocuments.length} active documents`, {
    node: "update_memory",
  });

  return {
    conversationSummary: memory.summary,
    activeDocuments,
    actionsTaken: ["update_memory"],
    nextStep: "end",
  };
};
