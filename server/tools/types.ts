import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * A named callable the reasoning loop may invoke. `execute` receives
 * arguments that already passed `parameters`.
 */
export type ToolDefinition = {
  name: string;
  description: string;
  parameters: z.ZodTypeAny;
  execute(args: unknown): Promise<string>;
};

export type ToolConfig<T extends z.ZodTypeAny> = {
  name: string;
  description: string;
  parameters: T;
  execute: (args: z.infer<T>) => Promise<string>;
};

export function defineTool<T extends z.ZodTypeAny>(config: ToolConfig<T>): ToolDefinition {
  return {
    name: config.name,
    description: config.description,
    parameters: config.parameters,
    execute: async (args: unknown) => config.execute(config.parameters.parse(args)),
  };
}

/**
 * JSON Schema for a zod type, without the $schema marker that
 * zodToJsonSchema prepends.
 */
export function toJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { ...zodToJsonSchema(schema, { target: "openApi3" }) };
  delete jsonSchema.$schema;
  return jsonSchema;
}
