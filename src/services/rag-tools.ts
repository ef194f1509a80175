/**
 * Tool registry for the MCP server
 *
 * Every service operation is a tool: zod-validated input, JSON text output,
 * and a structured `{ error, details?, code, status }` body on failure.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { RagError, ValidationError, statusFor, toErrorBody } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { RagResult, err, ok } from '../lib/result-types.js';
import {
  AskDocumentsInputSchema,
  DocumentChunkInputSchema,
  EmbedBatchInputSchema,
  EmbedInputSchema,
  EmptyInputSchema,
  IdInputSchema,
  RagInputSchema,
  SearchInputSchema,
  UploadDocumentInputSchema,
  type ToolInputSchema,
  type ToolMetadata,
  type ToolResponse,
} from '../models/mcp-types.js';
import type { DocumentService } from './document-service.js';
import type { EmbeddingService } from './embedding-service.js';

export interface RagServices {
  embeddings: EmbeddingService;
  documents: DocumentService;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  inputSchema: ToolInputSchema;
  run(input: z.output<S>, services: RagServices): Promise<RagResult<unknown>> | RagResult<unknown>;
}

interface RegisteredTool extends ToolMetadata {
  invoke(args: unknown, services: RagServices): Promise<RagResult<unknown>>;
}

function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    invoke: async (args, services) => {
      const parsed = definition.schema.safeParse(args ?? {});
      if (!parsed.success) {
        const details = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        return err(new ValidationError(`Invalid arguments for ${definition.name}`, details));
      }
      return definition.run(parsed.data, services);
    },
  };
}

const noArguments: ToolInputSchema = { type: 'object', properties: {} };

const idArgument: ToolInputSchema = {
  type: 'object',
  properties: { id: { type: 'integer', minimum: 1, description: 'Record id' } },
  required: ['id'],
};

// Widen service results to the registry's common Result type
const widen = <T>(result: RagResult<T>): RagResult<unknown> => result;

export const RAG_TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'embed',
    description: 'Embed a text and store it; long texts are chunked and averaged',
    schema: EmbedInputSchema,
    inputSchema: {
      type: 'object',
      properties: { text: { type: 'string', description: 'Text to embed' } },
      required: ['text'],
    },
    run: async (input, s) => widen(await s.embeddings.embed(input.text)),
  }),
  defineTool({
    name: 'embed_batch',
    description: 'Embed and store several texts; stops at the first failure',
    schema: EmbedBatchInputSchema,
    inputSchema: {
      type: 'object',
      properties: { texts: { type: 'array', items: { type: 'string' }, minItems: 1 } },
      required: ['texts'],
    },
    run: async (input, s) => widen(await s.embeddings.embedBatch(input.texts)),
  }),
  defineTool({
    name: 'embed_query',
    description: 'Embed a text without storing it',
    schema: EmbedInputSchema,
    inputSchema: {
      type: 'object',
      properties: { text: { type: 'string', description: 'Text to embed' } },
      required: ['text'],
    },
    run: async (input, s) => widen(await s.embeddings.embedQuery(input.text)),
  }),
  defineTool({
    name: 'search',
    description: 'Find the stored texts most similar to a query',
    schema: SearchInputSchema,
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query' },
        topK: { type: 'integer', minimum: 1, maximum: 100, default: 5 },
        truncate: { type: 'boolean', default: true },
      },
      required: ['query'],
    },
    run: async (input, s) =>
      widen(await s.embeddings.search(input.query, input.topK, input.truncate)),
  }),
  defineTool({
    name: 'rag',
    description: 'Answer a question using the most similar stored texts as context',
    schema: RagInputSchema,
    inputSchema: {
      type: 'object',
      properties: {
        question: { type: 'string' },
        useRetrieval: { type: 'boolean', default: true },
        topK: { type: 'integer', minimum: 1, maximum: 100, default: 3 },
      },
      required: ['question'],
    },
    run: async (input, s) =>
      widen(await s.embeddings.answer(input.question, input.useRetrieval, input.topK)),
  }),
  defineTool({
    name: 'list_embeddings',
    description: 'List every stored text with its vector',
    schema: EmptyInputSchema,
    inputSchema: noArguments,
    run: (_input, s) => widen(s.embeddings.list()),
  }),
  defineTool({
    name: 'get_embedding',
    description: 'Fetch one stored text by id',
    schema: IdInputSchema,
    inputSchema: idArgument,
    run: (input, s) => widen(s.embeddings.get(input.id)),
  }),
  defineTool({
    name: 'delete_embedding',
    description: 'Delete one stored text by id',
    schema: IdInputSchema,
    inputSchema: idArgument,
    run: (input, s) => widen(s.embeddings.delete(input.id)),
  }),
  defineTool({
    name: 'upload_document',
    description: 'Upload a Markdown document; it is chunked, embedded and stored atomically',
    schema: UploadDocumentInputSchema,
    inputSchema: {
      type: 'object',
      properties: {
        fileName: { type: 'string', description: 'File name ending in .md' },
        content: { type: 'string', description: 'Markdown content' },
      },
      required: ['fileName', 'content'],
    },
    run: async (input, s) => widen(await s.documents.upload(input.fileName, input.content)),
  }),
  defineTool({
    name: 'list_documents',
    description: 'List uploaded documents with their chunk counts',
    schema: EmptyInputSchema,
    inputSchema: noArguments,
    run: (_input, s) => widen(s.documents.list()),
  }),
  defineTool({
    name: 'get_document',
    description: 'Fetch one document by id',
    schema: IdInputSchema,
    inputSchema: idArgument,
    run: (input, s) => widen(s.documents.get(input.id)),
  }),
  defineTool({
    name: 'document_chunks',
    description: 'List the chunks of a document in order',
    schema: IdInputSchema,
    inputSchema: idArgument,
    run: (input, s) => widen(s.documents.chunks(input.id)),
  }),
  defineTool({
    name: 'document_chunk',
    description: 'Fetch one chunk of a document',
    schema: DocumentChunkInputSchema,
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'integer', minimum: 1, description: 'Document id' },
        chunkIndex: { type: 'integer', minimum: 0, description: 'Chunk index (0-based)' },
      },
      required: ['id', 'chunkIndex'],
    },
    run: (input, s) => widen(s.documents.chunk(input.id, input.chunkIndex)),
  }),
  defineTool({
    name: 'delete_document',
    description: 'Delete a document and all of its chunks',
    schema: IdInputSchema,
    inputSchema: idArgument,
    run: (input, s) => widen(s.documents.delete(input.id)),
  }),
  defineTool({
    name: 'ask_documents',
    description: 'Answer a question from uploaded documents, with links to the cited chunks',
    schema: AskDocumentsInputSchema,
    inputSchema: {
      type: 'object',
      properties: {
        question: { type: 'string' },
        topK: { type: 'integer', minimum: 1, maximum: 100, default: 3 },
      },
      required: ['question'],
    },
    run: async (input, s) => widen(await s.documents.ask(input.question, input.topK)),
  }),
  defineTool({
    name: 'document_stats',
    description: 'Count documents and chunks',
    schema: EmptyInputSchema,
    inputSchema: noArguments,
    run: (_input, s) => widen(s.documents.stats()),
  }),
  defineTool({
    name: 'stats',
    description: 'Count stored texts and show chunk settings',
    schema: EmptyInputSchema,
    inputSchema: noArguments,
    run: (_input, s) => widen(s.embeddings.stats()),
  }),
  defineTool({
    name: 'health',
    description: 'Check the model backend and the database',
    schema: EmptyInputSchema,
    inputSchema: noArguments,
    run: async (_input, s) => ok(await s.embeddings.health()),
  }),
];

/**
 * Render a failure as the tool error body
 */
export function toolError(error: unknown): ToolResponse {
  const body = { ...toErrorBody(error), status: statusFor(error) };
  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
    isError: true,
  };
}

/**
 * Dispatches tool calls to the services
 */
export class RagToolHandler {
  private readonly tools: Map<string, RegisteredTool>;

  constructor(
    private readonly services: RagServices,
    tools: readonly RegisteredTool[] = RAG_TOOLS
  ) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  listTools(): ToolMetadata[] {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  /**
   * @throws McpError (MethodNotFound) for an unknown tool name
   */
  async callTool(name: string, args: unknown): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    const started = performance.now();
    let result: RagResult<unknown>;
    try {
      result = await tool.invoke(args, this.services);
    } catch (error) {
      logger.error(`Tool ${name} threw`, { error: error instanceof Error ? error.message : String(error) });
      return toolError(error);
    }

    const durationMs = Math.round(performance.now() - started);

    return result.match(
      (value): ToolResponse => {
        logger.debug(`Tool ${name} completed`, { durationMs });
        return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
      },
      (error: RagError): ToolResponse => {
        logger.info(`Tool ${name} failed`, { code: error.code, durationMs });
        return toolError(error);
      }
    );
  }
}
