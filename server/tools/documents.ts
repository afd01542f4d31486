/**
 * Document Tools
 *
 * Purpose:
 * Search, read and aggregate the document corpus the task handlers work on.
 * The corpus is a JSON file loaded once per retriever.
 *
 * Note: Uses snake_case to match the corpus file and the ids the model cites.
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { DOCUMENT_CORPUS_PATH, DOCUMENT_SEARCH_LIMITS } from "../config/constants";
import { ConfigurationError } from "../utils/errorHandler";
import { defineTool, type ToolDefinition } from "./types";

export const DOCUMENT_TYPES = ["invoice", "contract", "claim", "report"] as const;

const documentSchema = z.object({
  doc_id: z.string().min(1),
  title: z.string(),
  doc_type: z.enum(DOCUMENT_TYPES),
  content: z.string(),
  metadata: z.object({
    client: z.string().optional(),
    amount: z.number().optional(),
    date: z.string().optional(),
  }),
});

export type Document = z.infer<typeof documentSchema>;
export type DocumentType = Document["doc_type"];

export type DocumentMatch = {
  document: Document;
  score: number;
};

export type DocumentStatistics = {
  total_documents: number;
  by_type: Record<DocumentType, number>;
  total_amount: number;
  average_amount: number;
  total_characters: number;
};

export function loadDocumentCorpus(corpusPath: string = DOCUMENT_CORPUS_PATH): Document[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(corpusPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`[Documents] Could not read corpus at ${corpusPath}: ${String(err)}`);
  }

  const parsed = z.array(documentSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(fromZodError(parsed.error, { prefix: "[Documents] Invalid corpus" }).message);
  }
  return parsed.data;
}

function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^a-z0-9#-]+/)
    .filter(term => term.length > 1);
}

export class DocumentRetriever {
  private documents: Map<string, Document>;

  constructor(documents: Document[] = loadDocumentCorpus()) {
    this.documents = new Map(documents.map(doc => [doc.doc_id, doc]));
  }

  getDocument(docId: string): Document | undefined {
    return this.documents.get(docId);
  }

  getAll(): Document[] {
    return Array.from(this.documents.values());
  }

  /**
   * Score = number of distinct query terms found in title + content.
   * Ties keep corpus order.
   */
  searchByKeyword(query: string, limit: number = DOCUMENT_SEARCH_LIMITS.MAX_RESULTS): DocumentMatch[] {
    const terms = Array.from(new Set(tokenizeQuery(query)));
    if (terms.length === 0) return [];

    return this.getAll()
      .map(document => {
        const haystack = `${document.title} ${document.content}`.toLowerCase();
        const score = terms.filter(term => haystack.includes(term)).length;
        return { document, score };
      })
      .filter(match => match.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  searchByType(docType: DocumentType): Document[] {
    return this.getAll().filter(doc => doc.doc_type === docType);
  }

  /**
   * Documents whose amount lies within [min, max]; either bound may be open.
   */
  searchByAmount(min?: number, max?: number): Document[] {
    return this.getAll().filter(doc => {
      const amount = doc.metadata.amount;
      if (amount === undefined) return false;
      if (min !== undefined && amount < min) return false;
      if (max !== undefined && amount > max) return false;
      return true;
    });
  }

  getStatistics(): DocumentStatistics {
    const documents = this.getAll();
    const byType: Record<DocumentType, number> = { invoice: 0, contract: 0, claim: 0, report: 0 };
    const amounts: number[] = [];
    let totalCharacters = 0;

    for (const doc of documents) {
      byType[doc.doc_type]++;
      totalCharacters += doc.content.length;
      if (doc.metadata.amount !== undefined) amounts.push(doc.metadata.amount);
    }

    const totalAmount = amounts.reduce((sum, amount) => sum + amount, 0);
    return {
      total_documents: documents.length,
      by_type: byType,
      total_amount: totalAmount,
      average_amount: amounts.length > 0 ? Math.round((totalAmount / amounts.length) * 100) / 100 : 0,
      total_characters: totalCharacters,
    };
  }
}

function summarizeDocument(doc: Document) {
  const preview = doc.content.length > DOCUMENT_SEARCH_LIMITS.PREVIEW_LENGTH
    ? `${doc.content.slice(0, DOCUMENT_SEARCH_LIMITS.PREVIEW_LENGTH)}...`
    : doc.content;
  return {
    doc_id: doc.doc_id,
    title: doc.title,
    doc_type: doc.doc_type,
    amount: doc.metadata.amount ?? null,
    preview,
  };
}

const documentSearchParameters = z.object({
  query: z.string().default("").describe("Keywords to search for (keyword search)"),
  search_type: z.enum(["keyword", "type", "amount"]).default("keyword"),
  doc_type: z.enum(DOCUMENT_TYPES).optional().describe("Document type (type search)"),
  min_amount: z.number().optional().describe("Lower amount bound, inclusive (amount search)"),
  max_amount: z.number().optional().describe("Upper amount bound, inclusive (amount search)"),
});

export function createDocumentTools(retriever: DocumentRetriever): ToolDefinition[] {
  const documentSearch = defineTool({
    name: "document_search",
    description:
      "Search documents. search_type 'keyword' matches query terms, 'type' filters by doc_type, 'amount' filters by min_amount/max_amount.",
    parameters: documentSearchParameters,
    execute: async args => {
      let results: Document[];
      switch (args.search_type) {
        case "keyword":
          results = retriever.searchByKeyword(args.query).map(match => match.document);
          break;
        case "type":
          if (!args.doc_type) return "Error: doc_type is required for a type search.";
          results = retriever.searchByType(args.doc_type);
          break;
        case "amount":
          results = retriever.searchByAmount(args.min_amount, args.max_amount);
          break;
      }

      if (results.length === 0) {
        return "No documents matched the search.";
      }
      return JSON.stringify({ count: results.length, documents: results.map(summarizeDocument) });
    },
  });

  const documentReader = defineTool({
    name: "document_reader",
    description: "Read the full content and metadata of a document by its doc_id.",
    parameters: z.object({
      doc_id: z.string().min(1).describe("The document id, e.g. INV-001"),
    }),
    execute: async ({ doc_id }) => {
      const doc = retriever.getDocument(doc_id);
      if (!doc) return `Document ${doc_id} not found.`;
      return JSON.stringify(doc);
    },
  });

  const documentStatistics = defineTool({
    name: "document_statistics",
    description: "Counts by type, total and average amounts, and total characters across all documents.",
    parameters: z.object({}),
    execute: async () => JSON.stringify(retriever.getStatistics()),
  });

  return [documentSearch, documentReader, documentStatistics];
}
