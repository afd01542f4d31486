import type { PromptTemplate } from "../config/prompts";
import type { ChatMessage, InferenceProvider } from "../llm/types";
import type { ToolDefinition } from "../tools/types";
import type { TurnLogger } from "../utils/logger";
import type { TaskIntent, TaskResponse } from "./schemas";
import type { ConversationState, StateUpdate } from "./state";

export type ReasoningLoopLimits = {
  maxToolSteps: number;
  maxValidationAttempts: number;
};

export type TaskHandlerDeps = {
  inference: InferenceProvider;
  tools: readonly ToolDefinition[];
  prompt: PromptTemplate;
  limits: ReasoningLoopLimits;
  model?: string;
  logger: TurnLogger;
};

export type TaskHandlerResult<T extends TaskResponse = TaskResponse> = {
  newMessages: ChatMessage[];
  structuredResponse: T;
  toolsUsed: string[];
};

export type TaskHandler = (
  input: string,
  history: ChatMessage[],
  deps: TaskHandlerDeps,
) => Promise<TaskHandlerResult>;

export type ModelSelection = {
  classification: string;
  memory: string;
  tasks: Record<TaskIntent, string>;
};

/**
 * Everything a graph node may use besides the state itself. Built once per
 * router; the logger is swapped in per turn.
 */
export type NodeContext = {
  inference: InferenceProvider;
  tools: readonly ToolDefinition[];
  taskHandlers: Record<TaskIntent, TaskHandler>;
  promptTemplates: Record<TaskIntent, PromptTemplate>;
  limits: ReasoningLoopLimits;
  models: ModelSelection;
  logger: TurnLogger;
};

export type GraphNode = (state: ConversationState, ctx: NodeContext) => Promise<StateUpdate>;
