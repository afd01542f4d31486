import { v4 as uuidv4 } from "uuid";
import type { ChatMessage, ToolCall } from "./types";

export function createSystemMessage(content: string): ChatMessage {
  return { id: uuidv4(), role: "system", content };
}

export function createUserMessage(content: string): ChatMessage {
  return { id: uuidv4(), role: "user", content };
}

export function createAssistantMessage(content: string, toolCalls: ToolCall[] = []): ChatMessage {
  return { id: uuidv4(), role: "assistant", content, toolCalls };
}

export function createToolMessage(call: ToolCall, content: string): ChatMessage {
  return { id: uuidv4(), role: "tool", content, toolCallId: call.id, name: call.name };
}

/**
 * Render user/assistant turns as "role: content" lines, newest last.
 * System and tool messages are left out.
 */
export function formatHistory(history: ChatMessage[], limit?: number): string {
  const conversational = history.filter(m => m.role === "user" || m.role === "assistant");
  const recent = limit !== undefined ? conversational.slice(-limit) : conversational;
  return recent
    .filter(m => m.content.trim().length > 0)
    .map(m => `${m.role}: ${m.content}`)
    .join("\n");
}
