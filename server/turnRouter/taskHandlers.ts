/**
 * Task Handlers
 *
 * QA, summarization and calculation share one reasoning loop and differ only
 * in their prompt template and response schema. Dispatch is a closed table
 * keyed by task intent, so adding an intent without a handler fails to
 * compile.
 */

import { MODEL_ASSIGNMENTS } from "../config/models";
import { ConfigurationError } from "../utils/errorHandler";
import { requireUserInput } from "./intentClassifier";
import { runReasoningLoop } from "./reasoningLoop";
import { RESPONSE_SCHEMAS, type ResponseSchemaDefinition, type TaskIntent, type TaskResponse } from "./schemas";
import type { TaskNodeName } from "./state";
import type { GraphNode, TaskHandler } from "./types";

export const TASK_NODE_NAMES: Record<TaskIntent, TaskNodeName> = {
  qa: "qa_agent",
  summarization: "summarization_agent",
  calculation: "calculation_agent",
};

export const TASK_MODELS: Record<TaskIntent, string> = {
  qa: MODEL_ASSIGNMENTS.QA_AGENT,
  summarization: MODEL_ASSIGNMENTS.SUMMARIZATION_AGENT,
  calculation: MODEL_ASSIGNMENTS.CALCULATION_AGENT,
};

export function createTaskHandler<T extends TaskResponse>(schema: ResponseSchemaDefinition<T>): TaskHandler {
  return async (input, history, deps) => {
    const prompt = deps.prompt({ input, history });
    const turnMessage = prompt[prompt.length - 1];
    if (!turnMessage || turnMessage.role !== "user") {
      throw new ConfigurationError(`Prompt template for ${schema.name} must end with the user's message`);
    }

    const model = deps.inference.bindTools(deps.tools, { model: deps.model });
    const result = await runReasoningLoop({
      model,
      inference: deps.inference,
      tools: deps.tools,
      prompt,
      schema,
      limits: deps.limits,
      structuredModel: deps.model,
      logger: deps.logger,
    });

    return {
      newMessages: [turnMessage, ...result.messages],
      structuredResponse: result.structuredResponse,
      toolsUsed: result.toolsUsed,
    };
  };
}

export const TASK_HANDLERS: Record<TaskIntent, TaskHandler> = {
  qa: createTaskHandler(RESPONSE_SCHEMAS.answer),
  summarization: createTaskHandler(RESPONSE_SCHEMAS.summarization),
  calculation: createTaskHandler(RESPONSE_SCHEMAS.calculation),
};

export function createTaskNode(intent: TaskIntent): GraphNode {
  const nodeName = TASK_NODE_NAMES[intent];

  return async (state, ctx) => {
    const input = requireUserInput(state);
    const result = await ctx.taskHandlers[intent](input, state.messages, {
      inference: ctx.inference,
      tools: ctx.tools,
      prompt: ctx.promptTemplates[intent],
      limits: ctx.limits,
      model: ctx.models.tasks[intent],
      logger: ctx.logger,
    });

    ctx.logger.info(`[TaskHandler] ${nodeName} produced a response`, {
      node: nodeName,
      toolsUsed: result.toolsUsed,
    });

    return {
      messages: result.newMessages,
      currentResponse: result.structuredResponse,
      toolsUsed: result.toolsUsed,
      actionsTaken: [nodeName],
      nextStep: "update_memory",
    };
  };
}
