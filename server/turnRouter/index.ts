export { createTurnRouter, resolveNextNode, turnRequestSchema } from "./router";
export type { TurnRequest, TurnRouter, TurnRouterConfig } from "./router";
export { classifyIntent, classifyIntentNode } from "./intentClassifier";
export { consolidateMemory, updateMemoryNode } from "./memoryConsolidator";
export { executeToolCall, runReasoningLoop } from "./reasoningLoop";
export { createTaskHandler, createTaskNode, TASK_HANDLERS, TASK_NODE_NAMES } from "./taskHandlers";
export * from "./schemas";
export * from "./state";
export type * from "./types";
