/**
 * Reasoning Loop
 *
 * Purpose:
 * Drives a tool-bound model until it stops requesting tools, then asks for a
 * structured value and validates it with the response type's constructor.
 *
 * Budgets:
 * - maxToolSteps model calls while tools are being requested
 * - maxValidationAttempts structured-output calls; each rejection is fed
 *   back to the model before the next attempt
 *
 * Tool failures never abort the loop. They come back to the model as a tool
 * message starting with "Error:" so it can correct itself.
 */

import type { ZodIssue } from "zod";
import { createAssistantMessage, createToolMessage, createUserMessage } from "../llm/messages";
import type { ChatMessage, InferenceProvider, ToolBoundModel, ToolCall } from "../llm/types";
import type { ToolDefinition } from "../tools/types";
import { getErrorMessage, ResponseValidationError, StructuredOutputError } from "../utils/errorHandler";
import type { TurnLogger } from "../utils/logger";
import type { ResponseSchemaDefinition } from "./schemas";
import type { ReasoningLoopLimits } from "./types";

export type ReasoningLoopParams<T> = {
  model: ToolBoundModel;
  inference: InferenceProvider;
  tools: readonly ToolDefinition[];
  prompt: ChatMessage[];
  schema: ResponseSchemaDefinition<T>;
  limits: ReasoningLoopLimits;
  structuredModel?: string;
  logger: TurnLogger;
};

export type ReasoningLoopResult<T> = {
  /** Assistant and tool messages produced by the loop, in order. */
  messages: ChatMessage[];
  structuredResponse: T;
  toolsUsed: string[];
};

function parseToolArguments(raw: string): unknown {
  return raw.trim() ? JSON.parse(raw) : {};
}

export async function executeToolCall(
  call: ToolCall,
  tools: ReadonlyMap<string, ToolDefinition>,
  logger?: TurnLogger,
): Promise<ChatMessage> {
  const tool = tools.get(call.name);
  if (!tool) {
    const available = Array.from(tools.keys()).join(", ");
    logger?.warn(`[ReasoningLoop] Model requested unknown tool "${call.name}"`);
    return createToolMessage(call, `Error: Unknown tool "${call.name}". Available tools: ${available}`);
  }

  let args: unknown;
  try {
    args = parseToolArguments(call.arguments);
  } catch (err) {
    logger?.warn(`[ReasoningLoop] Unparseable arguments for ${call.name}`, { error: getErrorMessage(err) });
    return createToolMessage(call, `Error: Arguments for ${call.name} are not valid JSON`);
  }

  try {
    const output = await tool.execute(args);
    logger?.debug(`[ReasoningLoop] ${call.name} returned ${output.length} chars`);
    return createToolMessage(call, output);
  } catch (err) {
    const message = getErrorMessage(err);
    logger?.warn(`[ReasoningLoop] Tool ${call.name} failed`, { error: message });
    return createToolMessage(call, `Error: ${message}`);
  }
}

export async function runReasoningLoop<T>(params: ReasoningLoopParams<T>): Promise<ReasoningLoopResult<T>> {
  const { model, inference, prompt, schema, limits, logger } = params;
  const toolsByName = new Map(params.tools.map(tool => [tool.name, tool]));

  const conversation: ChatMessage[] = [...prompt];
  const produced: ChatMessage[] = [];
  const toolsUsed: string[] = [];

  let answered = false;
  for (let step = 1; step <= limits.maxToolSteps; step++) {
    const reply = await model.invoke(conversation);
    const assistant = createAssistantMessage(reply.content, reply.toolCalls);
    conversation.push(assistant);
    produced.push(assistant);

    if (reply.toolCalls.length === 0) {
      answered = true;
      break;
    }

    logger.debug(`[ReasoningLoop] Step ${step}: ${reply.toolCalls.map(c => c.name).join(", ")}`);
    for (const call of reply.toolCalls) {
      const toolMessage = await executeToolCall(call, toolsByName, logger);
      conversation.push(toolMessage);
      produced.push(toolMessage);
      toolsUsed.push(call.name);
    }
  }

  if (!answered) {
    throw new ResponseValidationError(
      schema.name,
      `${schema.name}: model was still requesting tools after ${limits.maxToolSteps} steps`,
      { toolsUsed },
    );
  }

  // Feedback messages steer the retries but are not part of the conversation.
  const feedback: ChatMessage[] = [];
  let lastError = "";
  let lastIssues: ZodIssue[] = [];

  for (let attempt = 1; attempt <= limits.maxValidationAttempts; attempt++) {
    let raw: unknown;
    try {
      raw = await inference.generateStructured({
        messages: [...conversation, ...feedback],
        schema: schema.structured,
        model: params.structuredModel,
      });
    } catch (err) {
      if (!(err instanceof StructuredOutputError)) throw err;
      lastError = err.message;
      lastIssues = err.issues;
      logger.warn(`[ReasoningLoop] ${schema.name} attempt ${attempt} unparseable`, { error: err.message });
      feedback.push(createUserMessage(`Your previous output could not be parsed: ${err.message}. Respond with a single JSON object.`));
      continue;
    }

    const result = schema.create(raw);
    if (result.success) {
      return { messages: produced, structuredResponse: result.data, toolsUsed };
    }

    lastError = result.error;
    lastIssues = result.issues;
    logger.warn(`[ReasoningLoop] ${schema.name} attempt ${attempt} rejected`, { error: result.error });
    feedback.push(
      createAssistantMessage(JSON.stringify(raw)),
      createUserMessage(`That response was rejected: ${result.error}. Correct it and respond again.`),
    );
  }

  throw new ResponseValidationError(
    schema.name,
    `${schema.name} rejected after ${limits.maxValidationAttempts} attempts: ${lastError}`,
    { issues: lastIssues, toolsUsed },
  );
}
