import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { eq } from "drizzle-orm";
import {
  CHECKPOINT_STATUSES,
  conversationCheckpoints as checkpointsTable,
  insertCheckpointSchema,
  type CheckpointStatus,
  type ConversationCheckpointRow,
} from "@shared/schema";
import { createDb, type Database } from "./db";
import { NODE_NAMES, conversationStateSchema, type ConversationState, type NodeName } from "./turnRouter/state";

export type { CheckpointStatus } from "@shared/schema";

export type Checkpoint = {
  sessionId: string;
  userId: string;
  state: ConversationState;
  status: CheckpointStatus;
  pendingNode: NodeName | null;
  step: number;
  error: string | null;
  updatedAt: Date;
};

export const checkpointSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  state: conversationStateSchema,
  status: z.enum(CHECKPOINT_STATUSES),
  pendingNode: z.enum(NODE_NAMES).nullable(),
  step: z.number().int().nonnegative(),
  error: z.string().nullable(),
  updatedAt: z.coerce.date(),
});

export interface CheckpointStore {
  load(sessionId: string): Promise<Checkpoint | undefined>;
  save(checkpoint: Checkpoint): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  /**
   * Run `fn` once every earlier call for the same session has settled.
   * Calls for different sessions do not wait on each other.
   */
  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Per-key promise chain. Each task starts after the previous task for its
 * key settles, whether it resolved or rejected.
 */
export class SessionQueue {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    const settled = () => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    return result.finally(settled);
  }

  get size(): number {
    return this.tails.size;
  }
}

export class MemCheckpointStore implements CheckpointStore {
  private checkpoints: Map<string, Checkpoint> = new Map();
  private queue = new SessionQueue();

  async load(sessionId: string): Promise<Checkpoint | undefined> {
    const checkpoint = this.checkpoints.get(sessionId);
    return checkpoint ? structuredClone(checkpoint) : undefined;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(checkpoint.sessionId, structuredClone(checkpoint));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.checkpoints.delete(sessionId);
  }

  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.queue.run(sessionId, fn);
  }
}

export function rowToCheckpoint(row: ConversationCheckpointRow): Checkpoint {
  const parsed = checkpointSchema.safeParse(row);
  if (!parsed.success) {
    throw new Error(fromZodError(parsed.error, { prefix: `Corrupt checkpoint for session ${row.sessionId}` }).message);
  }
  return parsed.data;
}

const checkpointRowSchema = insertCheckpointSchema.extend({
  state: conversationStateSchema,
  pendingNode: z.enum(NODE_NAMES).nullable(),
  step: z.number().int().nonnegative(),
});

export type CheckpointRow = z.infer<typeof checkpointRowSchema>;

export function checkpointToRow(checkpoint: Checkpoint): CheckpointRow {
  const parsed = checkpointRowSchema.safeParse(checkpoint);
  if (!parsed.success) {
    throw new Error(fromZodError(parsed.error, { prefix: `Invalid checkpoint for session ${checkpoint.sessionId}` }).message);
  }
  return parsed.data;
}

/**
 * Postgres-backed store. Serialization of turns still happens in process, so
 * one server instance should own a given session at a time.
 */
export class DbCheckpointStore implements CheckpointStore {
  private db: Database;
  private queue = new SessionQueue();

  constructor(db: Database = createDb()) {
    this.db = db;
  }

  async load(sessionId: string): Promise<Checkpoint | undefined> {
    const results = await this.db
      .select()
      .from(checkpointsTable)
      .where(eq(checkpointsTable.sessionId, sessionId))
      .limit(1);
    return results[0] ? rowToCheckpoint(results[0]) : undefined;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const values = checkpointToRow(checkpoint);

    await this.db
      .insert(checkpointsTable)
      .values(values)
      .onConflictDoUpdate({
        target: checkpointsTable.sessionId,
        set: {
          state: values.state,
          status: values.status,
          pendingNode: values.pendingNode,
          step: values.step,
          error: values.error,
          updatedAt: values.updatedAt,
        },
      });
  }

  async delete(sessionId: string): Promise<boolean> {
    const results = await this.db
      .delete(checkpointsTable)
      .where(eq(checkpointsTable.sessionId, sessionId))
      .returning({ sessionId: checkpointsTable.sessionId });
    return results.length > 0;
  }

  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.queue.run(sessionId, fn);
  }
}
