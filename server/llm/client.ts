import { OpenAI } from "openai";
import { LLM_MODELS } from "../config/models";
import { toJsonSchema, type ToolDefinition } from "../tools/types";
import { ConfigurationError, StructuredOutputError } from "../utils/errorHandler";
import type {
  AssistantReply,
  BindToolsOptions,
  ChatMessage,
  InferenceProvider,
  StructuredRequest,
  ToolBoundModel,
  ToolCall,
} from "./types";

export type OpenAIProviderOptions = {
  apiKey?: string;
  defaultModel?: string;
  temperature?: number;
};

export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.Completions.ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "user":
        return { role: "user", content: message.content };
      case "assistant":
        if (message.toolCalls.length === 0) {
          return { role: "assistant", content: message.content };
        }
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map(call => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      case "tool":
        return { role: "tool", content: message.content, tool_call_id: message.toolCallId };
      default: {
        const _exhaustive: never = message;
        throw new Error(`[LLM Client] Unhandled message: ${JSON.stringify(_exhaustive)}`);
      }
    }
  });
}

export function toChatCompletionTool(tool: ToolDefinition): OpenAI.Chat.Completions.ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: toJsonSchema(tool.parameters),
    },
  };
}

/**
 * InferenceProvider backed by OpenAI chat completions: function tools for the
 * reasoning loop, json_schema response format for structured output.
 */
export class OpenAIInferenceProvider implements InferenceProvider {
  private client: OpenAI;
  private defaultModel: string;
  private temperature?: number;

  constructor(options: OpenAIProviderOptions = {}) {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) throw new ConfigurationError("[LLM Client] OPENAI_API_KEY is not set");
    this.client = new OpenAI({ apiKey });
    this.defaultModel = options.defaultModel ?? LLM_MODELS.STANDARD_REASONING;
    this.temperature = options.temperature;
  }

  bindTools(tools: readonly ToolDefinition[], options: BindToolsOptions = {}): ToolBoundModel {
    const specs = tools.map(toChatCompletionTool);
    const model = options.model ?? this.defaultModel;

    return {
      toolNames: tools.map(t => t.name),
      invoke: async (messages: ChatMessage[]): Promise<AssistantReply> => {
        const response = await this.client.chat.completions.create({
          model,
          messages: toOpenAIMessages(messages),
          ...(specs.length > 0 && { tools: specs, tool_choice: "auto" as const }),
          ...(this.temperature !== undefined && { temperature: this.temperature }),
        });

        const message = response.choices[0]?.message;
        const toolCalls: ToolCall[] = (message?.tool_calls ?? [])
          .filter(call => call.type === "function")
          .map(call => ({ id: call.id, name: call.function.name, arguments: call.function.arguments }));

        return {
          content: message?.content ?? "",
          toolCalls,
        };
      },
    };
  }

  async generateStructured(request: StructuredRequest): Promise<unknown> {
    const response = await this.client.chat.completions.create({
      model: request.model ?? this.defaultModel,
      messages: toOpenAIMessages(request.messages),
      response_format: {
        type: "json_schema",
        json_schema: {
          name: request.schema.name,
          description: request.schema.description,
          schema: request.schema.jsonSchema,
          strict: false,
        },
      },
      ...(this.temperature !== undefined && { temperature: this.temperature }),
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new StructuredOutputError(request.schema.name, `Empty response from model for ${request.schema.name}`);
    }

    try {
      return JSON.parse(content);
    } catch (err) {
      throw new StructuredOutputError(
        request.schema.name,
        `Model returned invalid JSON for ${request.schema.name}`,
        { cause: err },
      );
    }
  }
}
