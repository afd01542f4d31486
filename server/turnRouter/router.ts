/**
 * Turn Router
 *
 * Purpose:
 * Runs one conversation turn as a small state machine:
 *
 *   classify_intent → qa_agent | summarization_agent | calculation_agent → update_memory → end
 *                   ↘ (unknown) end
 *
 * State lives in the checkpoint store, never in the router. It is saved at
 * turn start, after every node (in_progress, with the next pending node) and
 * once more at turn end (completed). An in_progress checkpoint left by a
 * crash is resumed from its pending node; a failed one never is.
 *
 * Turns on the same session run one at a time via store.runExclusive.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { MODEL_ASSIGNMENTS } from "../config/models";
import { TASK_PROMPT_TEMPLATES, type PromptTemplate } from "../config/prompts";
import { REASONING_LOOP_LIMITS } from "../config/constants";
import type { InferenceProvider } from "../llm/types";
import { MemCheckpointStore, type Checkpoint, type CheckpointStatus, type CheckpointStore } from "../storage";
import { createDefaultTools } from "../tools";
import type { ToolDefinition } from "../tools/types";
import {
  AuthorizationError,
  ConfigurationError,
  getErrorMessage,
  NotFoundError,
  ValidationError,
  withTurnContext,
} from "../utils/errorHandler";
import { logInfo, TurnLogger } from "../utils/logger";
import { classifyIntentNode } from "./intentClassifier";
import { updateMemoryNode } from "./memoryConsolidator";
import { TASK_INTENTS, type TaskIntent } from "./schemas";
import {
  beginTurn,
  createInitialState,
  mergeStateUpdate,
  type ConversationState,
  type NextStep,
  type NodeName,
  type StateUpdate,
} from "./state";
import { createTaskNode, TASK_HANDLERS, TASK_MODELS } from "./taskHandlers";
import type { GraphNode, NodeContext, ReasoningLoopLimits, TaskHandler } from "./types";

export const turnRequestSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId is required"),
  userId: z.string().trim().min(1, "userId is required"),
  userInput: z.string().refine(input => input.trim().length > 0, "userInput must not be empty"),
});

export type TurnRequest = z.infer<typeof turnRequestSchema>;

export type TurnRouterConfig = {
  inference?: InferenceProvider;
  tools?: readonly ToolDefinition[];
  checkpointStore?: CheckpointStore;
  /** Replaces the default handler table; every task intent must be covered. */
  taskHandlers?: Partial<Record<TaskIntent, TaskHandler>>;
  /** Replaces the default prompt templates; every task intent must be covered. */
  promptTemplates?: Partial<Record<TaskIntent, PromptTemplate>>;
  limits?: Partial<ReasoningLoopLimits>;
};

export interface TurnRouter {
  runTurn(request: TurnRequest): Promise<ConversationState>;
  resumeTurn(sessionId: string, userId?: string): Promise<ConversationState>;
  getState(sessionId: string): Promise<Checkpoint | undefined>;
}

const GRAPH_NODES: Record<NodeName, GraphNode> = {
  classify_intent: classifyIntentNode,
  qa_agent: createTaskNode("qa"),
  summarization_agent: createTaskNode("summarization"),
  calculation_agent: createTaskNode("calculation"),
  update_memory: updateMemoryNode,
};

const NEXT_NODE: Record<NextStep, NodeName | null> = {
  classify_intent: "classify_intent",
  qa: "qa_agent",
  summarization: "summarization_agent",
  calculation: "calculation_agent",
  unknown: null,
  update_memory: "update_memory",
  end: null,
};

export function resolveNextNode(step: NextStep): NodeName | null {
  return NEXT_NODE[step];
}

function resolveTaskTable<V>(label: string, table: Partial<Record<TaskIntent, V>>): Record<TaskIntent, V> {
  const pick = (intent: TaskIntent): V => {
    const value = table[intent];
    if (!value) {
      throw new ConfigurationError(`No ${label} configured for task intent "${intent}"`);
    }
    return value;
  };
  return {
    qa: pick("qa"),
    summarization: pick("summarization"),
    calculation: pick("calculation"),
  };
}

function validateTools(tools: readonly ToolDefinition[]): void {
  const seen = new Set<string>();
  for (const tool of tools) {
    if (!tool.name.trim()) {
      throw new ConfigurationError("Tool names must not be empty");
    }
    if (seen.has(tool.name)) {
      throw new ConfigurationError(`Duplicate tool name "${tool.name}"`);
    }
    seen.add(tool.name);
  }
}

function resolveLimits(overrides: Partial<ReasoningLoopLimits> = {}): ReasoningLoopLimits {
  const limits: ReasoningLoopLimits = {
    maxToolSteps: overrides.maxToolSteps ?? REASONING_LOOP_LIMITS.MAX_TOOL_STEPS,
    maxValidationAttempts: overrides.maxValidationAttempts ?? REASONING_LOOP_LIMITS.MAX_VALIDATION_ATTEMPTS,
  };
  for (const [name, value] of Object.entries(limits)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
  }
  return limits;
}

class StateMachineTurnRouter implements TurnRouter {
  constructor(
    private readonly store: CheckpointStore,
    private readonly context: Omit<NodeContext, "logger">,
  ) {}

  runTurn(request: TurnRequest): Promise<ConversationState> {
    const parsed = turnRequestSchema.safeParse(request);
    if (!parsed.success) {
      return Promise.reject(
        new ValidationError(fromZodError(parsed.error, { prefix: "Invalid turn request" }).message),
      );
    }
    const { sessionId, userId, userInput } = parsed.data;

    return this.store.runExclusive(sessionId, async () => {
      const logger = new TurnLogger(sessionId, userId);
      const checkpoint = await this.store.load(sessionId);
      this.assertOwner(checkpoint, userId);

      if (checkpoint?.status === "in_progress") {
        if (checkpoint.state.userInput === userInput) {
          logger.info(`[TurnRouter] Resuming interrupted turn at ${checkpoint.pendingNode ?? "end"}`);
          return this.execute(checkpoint.state, checkpoint.pendingNode, checkpoint.step, logger);
        }
        logger.warn(`[TurnRouter] Abandoning interrupted turn at ${checkpoint.pendingNode ?? "end"}`, {
          abandonedInput: checkpoint.state.userInput,
        });
      }

      const previous = checkpoint?.state ?? createInitialState(sessionId, userId);
      const state = beginTurn(previous, userInput);
      let step = checkpoint?.step ?? 0;

      logger.info("[TurnRouter] Turn started", { messages: state.messages.length });
      step = await this.persist(state, "in_progress", "classify_intent", step);
      return this.execute(state, "classify_intent", step, logger);
    });
  }

  resumeTurn(sessionId: string, userId?: string): Promise<ConversationState> {
    return this.store.runExclusive(sessionId, async () => {
      const checkpoint = await this.store.load(sessionId);
      if (!checkpoint || checkpoint.status !== "in_progress") {
        throw new NotFoundError(`Interrupted turn for session ${sessionId}`);
      }
      if (userId !== undefined) {
        this.assertOwner(checkpoint, userId);
      }

      const logger = new TurnLogger(sessionId, checkpoint.userId);
      logger.info(`[TurnRouter] Resuming interrupted turn at ${checkpoint.pendingNode ?? "end"}`);
      return this.execute(checkpoint.state, checkpoint.pendingNode, checkpoint.step, logger);
    });
  }

  getState(sessionId: string): Promise<Checkpoint | undefined> {
    return this.store.load(sessionId);
  }

  private assertOwner(checkpoint: Checkpoint | undefined, userId: string): void {
    if (checkpoint && checkpoint.userId !== userId) {
      throw new AuthorizationError(`Session ${checkpoint.sessionId} belongs to a different user`);
    }
  }

  private async persist(
    state: ConversationState,
    status: CheckpointStatus,
    pendingNode: NodeName | null,
    step: number,
    error: string | null = null,
  ): Promise<number> {
    const next = step + 1;
    await this.store.save({
      sessionId: state.sessionId,
      userId: state.userId,
      state,
      status,
      pendingNode,
      step: next,
      error,
      updatedAt: new Date(),
    });
    return next;
  }

  private async execute(
    initial: ConversationState,
    startNode: NodeName | null,
    startStep: number,
    logger: TurnLogger,
  ): Promise<ConversationState> {
    const ctx: NodeContext = { ...this.context, logger };
    let state = initial;
    let step = startStep;
    let node = startNode;

    while (node) {
      const current: NodeName = node;
      logger.startStage(current);

      let update: StateUpdate;
      try {
        update = await GRAPH_NODES[current](state, ctx);
      } catch (err) {
        const duration = logger.endStage(current);
        logger.error(`[TurnRouter] ${current} failed`, err, { node: current, duration });
        await this.recordFailure(state, step, err, logger);
        if (err instanceof Error) {
          throw withTurnContext(err, { sessionId: state.sessionId, actionsTaken: state.actionsTaken });
        }
        throw err;
      }

      state = mergeStateUpdate(state, update);
      node = resolveNextNode(state.nextStep);
      step = await this.persist(state, "in_progress", node, step);
      logger.info(`[TurnRouter] ${current} → ${node ?? "end"}`, {
        node: current,
        duration: logger.endStage(current),
      });
    }

    await this.persist(state, "completed", null, step);
    logger.info("[TurnRouter] Turn completed", {
      intent: state.intent?.intent_type,
      actionsTaken: state.actionsTaken,
    });
    return state;
  }

  private async recordFailure(state: ConversationState, step: number, err: unknown, logger: TurnLogger): Promise<void> {
    try {
      await this.persist(state, "failed", null, step, getErrorMessage(err));
    } catch (saveErr) {
      logger.error("[TurnRouter] Could not record failed checkpoint", saveErr);
    }
  }
}

export function createTurnRouter(config: TurnRouterConfig): TurnRouter {
  if (!config.inference) {
    throw new ConfigurationError("An inference provider is required");
  }

  const tools = config.tools ?? createDefaultTools();
  validateTools(tools);

  const taskHandlers = resolveTaskTable<TaskHandler>("task handler", config.taskHandlers ?? TASK_HANDLERS);
  const promptTemplates = resolveTaskTable<PromptTemplate>(
    "prompt template",
    config.promptTemplates ?? TASK_PROMPT_TEMPLATES,
  );
  const limits = resolveLimits(config.limits);

  const store = config.checkpointStore ?? new MemCheckpointStore();
  logInfo(
    `[TurnRouter] Ready: ${tools.length} tools, ${TASK_INTENTS.length} task handlers, ` +
      `${limits.maxToolSteps} tool steps, ${limits.maxValidationAttempts} validation attempts`,
  );

  return new StateMachineTurnRouter(store, {
    inference: config.inference,
    tools,
    taskHandlers,
    promptTemplates,
    limits,
    models: {
      classification: MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION,
      memory: MODEL_ASSIGNMENTS.MEMORY_UPDATE,
      tasks: TASK_MODELS,
    },
  });
}
