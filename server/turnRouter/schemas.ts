/**
 * Structured Response Types
 *
 * Result shapes produced by the classifier, the task handlers and the memory
 * consolidator. Field names are snake_case because these are the exact
 * objects the model emits.
 *
 * Values are only obtained through the create* functions, which validate
 * (including cross-field rules) and freeze. They return a result instead of
 * throwing so every call site has to handle rejection.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { HIGH_CONFIDENCE_THRESHOLD } from "../config/constants";
import { toJsonSchema } from "../tools/types";
import type { StructuredSchema } from "../llm/types";

export const INTENT_TYPES = ["qa", "summarization", "calculation", "unknown"] as const;

export const TASK_INTENTS = ["qa", "summarization", "calculation"] as const;
export type TaskIntent = typeof TASK_INTENTS[number];

const confidenceSchema = z.number().min(0).max(1);
// Kept as emitted: with or without an offset, or a bare date.
const timestampSchema = z
  .union([z.string().datetime({ offset: true }), z.string().datetime({ local: true }), z.string().date()])
  .default(() => new Date().toISOString());

export const userIntentSchema = z.object({
  intent_type: z.enum(INTENT_TYPES).describe("Type of user intent"),
  confidence: confidenceSchema.describe("Confidence score of the intent classification"),
  reasoning: z.string().describe("Explanation of how the intent was determined"),
});

export const answerResponseSchema = z
  .object({
    question: z.string().describe("Question text"),
    answer: z.string().describe("The generated answer"),
    sources: z.array(z.string()).default([]).describe("Ids of the documents supporting the answer"),
    confidence: confidenceSchema.describe("Confidence score of the answer"),
    timestamp: timestampSchema,
  })
  .superRefine((response, ctx) => {
    if (response.confidence >= HIGH_CONFIDENCE_THRESHOLD && response.sources.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sources"],
        message: `Sources cannot be empty when confidence is high (${response.confidence}). Provide at least one source to support the claim`,
      });
    }
  });

export const summarizationResponseSchema = z.object({
  original_length: z.number().int().nonnegative().describe("Length of the original text"),
  summary: z.string().describe("The generated summary"),
  key_points: z.array(z.string()).describe("Key points extracted"),
  document_ids: z.array(z.string()).default([]).describe("Documents summarized"),
  timestamp: timestampSchema,
});

export const calculationResponseSchema = z.object({
  expression: z.string().describe("The mathematical expression"),
  result: z.number().finite().describe("The calculated result"),
  explanation: z.string().describe("Step-by-step explanation"),
  units: z.string().nullable().optional().describe("Units, if applicable"),
  timestamp: timestampSchema,
});

export const updateMemoryResponseSchema = z.object({
  summary: z.string().describe("Summary of the conversation up to this point"),
  document_ids: z
    .array(z.string())
    .default([])
    .describe("Ids of the documents relevant to the user's last message"),
});

export type UserIntent = Readonly<z.infer<typeof userIntentSchema>>;
export type AnswerResponse = Readonly<z.infer<typeof answerResponseSchema>>;
export type SummarizationResponse = Readonly<z.infer<typeof summarizationResponseSchema>>;
export type CalculationResponse = Readonly<z.infer<typeof calculationResponseSchema>>;
export type UpdateMemoryResponse = Readonly<z.infer<typeof updateMemoryResponseSchema>>;

export type TaskResponse = AnswerResponse | SummarizationResponse | CalculationResponse;

export type ConstructionResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; issues: z.ZodIssue[] };

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function construct<S extends z.ZodTypeAny>(schema: S, name: string, raw: unknown): ConstructionResult<z.infer<S>> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: fromZodError(parsed.error, { prefix: `Invalid ${name}` }).message,
      issues: parsed.error.issues,
    };
  }
  return { success: true, data: deepFreeze(parsed.data) };
}

export function createUserIntent(raw: unknown): ConstructionResult<UserIntent> {
  return construct(userIntentSchema, "UserIntent", raw);
}

export function createAnswerResponse(raw: unknown): ConstructionResult<AnswerResponse> {
  return construct(answerResponseSchema, "AnswerResponse", raw);
}

export function createSummarizationResponse(raw: unknown): ConstructionResult<SummarizationResponse> {
  return construct(summarizationResponseSchema, "SummarizationResponse", raw);
}

export function createCalculationResponse(raw: unknown): ConstructionResult<CalculationResponse> {
  return construct(calculationResponseSchema, "CalculationResponse", raw);
}

export function createUpdateMemoryResponse(raw: unknown): ConstructionResult<UpdateMemoryResponse> {
  return construct(updateMemoryResponseSchema, "UpdateMemoryResponse", raw);
}

/**
 * A response type as the rest of the router sees it: the JSON schema sent to
 * the model plus the validating constructor applied to whatever comes back.
 */
export type ResponseSchemaDefinition<T> = {
  name: string;
  structured: StructuredSchema;
  create: (raw: unknown) => ConstructionResult<T>;
};

function defineResponseSchema<T>(
  name: string,
  description: string,
  schema: z.ZodTypeAny,
  create: (raw: unknown) => ConstructionResult<T>,
): ResponseSchemaDefinition<T> {
  return {
    name,
    structured: { name, description, jsonSchema: toJsonSchema(schema) },
    create,
  };
}

export const RESPONSE_SCHEMAS = {
  userIntent: defineResponseSchema(
    "UserIntent",
    "User intent classification",
    userIntentSchema,
    createUserIntent,
  ),
  answer: defineResponseSchema(
    "AnswerResponse",
    "Structured response for Q&A tasks",
    answerResponseSchema,
    createAnswerResponse,
  ),
  summarization: defineResponseSchema(
    "SummarizationResponse",
    "Structured response for summarization tasks",
    summarizationResponseSchema,
    createSummarizationResponse,
  ),
  calculation: defineResponseSchema(
    "CalculationResponse",
    "Structured response for calculation tasks",
    calculationResponseSchema,
    createCalculationResponse,
  ),
  updateMemory: defineResponseSchema(
    "UpdateMemoryResponse",
    "Conversation memory after the latest turn",
    updateMemoryResponseSchema,
    createUpdateMemoryResponse,
  ),
} as const;
