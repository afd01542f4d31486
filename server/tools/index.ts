import { calculatorTool } from "./calculator";
import { createDocumentTools, DocumentRetriever } from "./documents";
import type { ToolDefinition } from "./types";

export { calculatorTool, evaluateExpression } from "./calculator";
export { DocumentRetriever, createDocumentTools, loadDocumentCorpus } from "./documents";
export type { Document, DocumentStatistics, DocumentType } from "./documents";
export { defineTool, toJsonSchema } from "./types";
export type { ToolDefinition, ToolConfig } from "./types";

/**
 * The tool set every task handler is bound to by default.
 */
export function createDefaultTools(retriever: DocumentRetriever = new DocumentRetriever()): ToolDefinition[] {
  return [calculatorTool, ...createDocumentTools(retriever)];
}
