import { pgTable, text, varchar, timestamp, jsonb, integer, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const CHECKPOINT_STATUSES = ["in_progress", "completed", "failed"] as const;
export type CheckpointStatus = typeof CHECKPOINT_STATUSES[number];

// One row per session: the latest conversation state and where the turn stands.
export const conversationCheckpoints = pgTable("conversation_checkpoints", {
  sessionId: varchar("session_id").primaryKey(),
  userId: varchar("user_id").notNull(),
  state: jsonb("state").notNull(), // Serialized ConversationState
  status: text("status").default("in_progress").notNull(),
  pendingNode: text("pending_node"), // Node to run on resume, null once the turn is over
  step: integer("step").default(0).notNull(), // Monotonic across the session
  error: text("error"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_conversation_checkpoints_user").on(table.userId),
]);

export const insertCheckpointSchema = createInsertSchema(conversationCheckpoints).extend({
  status: z.enum(CHECKPOINT_STATUSES),
});

export type ConversationCheckpointRow = typeof conversationCheckpoints.$inferSelect;
