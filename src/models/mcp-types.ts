import { z } from 'zod';

// ============================================================================
// Shared Fields
// ============================================================================

const IdField = z.number().int().describe("Record id (positive integer)");
const TopKField = (fallback: number) =>
  z.number().int().min(1).max(100).default(fallback).describe("Maximum results (1-100)");

// ============================================================================
// Standalone Embeddings
// ============================================================================

export const EmbedInputSchema = z.object({
  text: z.string().describe("Text to embed and store")
});

export type EmbedInput = z.infer<typeof EmbedInputSchema>;

export const EmbedBatchInputSchema = z.object({
  texts: z.array(z.string()).min(1).describe("Texts to embed and store, in order")
});

export type EmbedBatchInput = z.infer<typeof EmbedBatchInputSchema>;

export const SearchInputSchema = z.object({
  query: z.string().describe("Natural-language query"),
  topK: TopKField(5),
  truncate: z.boolean().default(true).describe("Shorten result texts to 300 characters")
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

export const RagInputSchema = z.object({
  question: z.string().describe("Question to answer"),
  useRetrieval: z.boolean().default(true).describe("Ground the answer in stored texts"),
  topK: TopKField(3)
});

export type RagInput = z.infer<typeof RagInputSchema>;

export const IdInputSchema = z.object({
  id: IdField
});

export type IdInput = z.infer<typeof IdInputSchema>;

export const EmptyInputSchema = z.object({}).passthrough();

// ============================================================================
// Documents
// ============================================================================

export const UploadDocumentInputSchema = z.object({
  fileName: z.string().describe("Markdown file name, must end in .md"),
  content: z.string().describe("Full Markdown content")
});

export type UploadDocumentInput = z.infer<typeof UploadDocumentInputSchema>;

export const DocumentChunkInputSchema = z.object({
  id: IdField,
  chunkIndex: z.number().int().describe("Chunk index (0-based)")
});

export type DocumentChunkInput = z.infer<typeof DocumentChunkInputSchema>;

export const AskDocumentsInputSchema = z.object({
  question: z.string().describe("Question to answer from uploaded documents"),
  topK: TopKField(3)
});

export type AskDocumentsInput = z.infer<typeof AskDocumentsInputSchema>;

// ============================================================================
// MCP Response Types
// ============================================================================

/**
 * MCP tool response format
 */
export type ToolResponse = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * JSON Schema advertised for a tool in tools/list
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
};

/**
 * MCP tool metadata for tool listing
 */
export type ToolMetadata = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};
