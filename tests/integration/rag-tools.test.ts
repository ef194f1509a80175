/**
 * Integration tests for the MCP tool handler
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { RAG_TOOLS, RagToolHandler, toolError } from '../../src/services/rag-tools.js';
import type { RagContext } from '../../src/services/rag-context.js';
import type { ToolResponse } from '../../src/models/mcp-types.js';
import { UpstreamTimeoutError } from '../../src/lib/errors.js';
import { FakeGateway } from '../helpers/fake-gateway.js';
import { createTestContext } from '../helpers/context-test-helper.js';

function payload(response: ToolResponse): unknown {
  return JSON.parse(response.content[0]?.text ?? 'null');
}

describe('RagToolHandler', () => {
  let gateway: FakeGateway;
  let ctx: RagContext;
  let handler: RagToolHandler;

  beforeEach(() => {
    gateway = new FakeGateway();
    ctx = createTestContext(gateway);
    handler = new RagToolHandler({ embeddings: ctx.embeddings, documents: ctx.documents });
  });

  afterEach(() => {
    ctx.close();
  });

  it('should list every tool with an object input schema', () => {
    const tools = handler.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      'embed',
      'embed_batch',
      'embed_query',
      'search',
      'rag',
      'list_embeddings',
      'get_embedding',
      'delete_embedding',
      'upload_document',
      'list_documents',
      'get_document',
      'document_chunks',
      'document_chunk',
      'delete_document',
      'ask_documents',
      'document_stats',
      'stats',
      'health',
    ]);
    expect(tools.every((t) => t.inputSchema.type === 'object')).toBe(true);
    expect(RAG_TOOLS).toHaveLength(18);
  });

  it('should return the operation result as JSON text', async () => {
    await handler.callTool('embed', { text: 'hello' });

    const response = await handler.callTool('list_embeddings', {});

    expect(response.isError).toBeUndefined();
    expect(payload(response)).toEqual([
      { id: 1, text: 'hello', embedding: [1, 0, 0], createdAt: expect.any(String) },
    ]);
  });

  it('should apply schema defaults', async () => {
    await handler.callTool('embed', { text: 'hello' });

    const response = await handler.callTool('search', { query: 'hello' });

    expect(payload(response)).toEqual({ query: 'hello', results: [{ id: 1, text: 'hello', similarity: 1 }] });
  });

  it('should answer 400 for arguments that fail the schema', async () => {
    const response = await handler.callTool('get_embedding', { id: 'one' });

    expect(response.isError).toBe(true);
    expect(payload(response)).toEqual({
      error: 'Invalid arguments for get_embedding',
      code: 'VALIDATION_ERROR',
      details: 'id: Expected number, received string',
      status: 400,
    });
  });

  it('should answer 400 for a missing required argument', async () => {
    const response = await handler.callTool('embed', undefined);

    expect(payload(response)).toMatchObject({ code: 'VALIDATION_ERROR', details: 'text: Required', status: 400 });
  });

  it('should answer 404 for an unknown id', async () => {
    const response = await handler.callTool('delete_document', { id: 7 });

    expect(payload(response)).toEqual({ error: 'Document 7 not found', code: 'NOT_FOUND', status: 404 });
  });

  it('should answer 504 when the backend times out', async () => {
    gateway.embedFailures.set('slow', new UpstreamTimeoutError('Backend embed timed out', 1000));

    const response = await handler.callTool('embed', { text: 'slow' });

    expect(payload(response)).toEqual({
      error: 'Backend embed timed out',
      code: 'UPSTREAM_TIMEOUT',
      details: 'Request exceeded 1000ms',
      status: 504,
    });
  });

  it('should throw MethodNotFound for an unknown tool', async () => {
    await expect(handler.callTool('drop_tables', {})).rejects.toBeInstanceOf(McpError);
  });
});

describe('toolError', () => {
  it('should map an unexpected failure to a 500 body', () => {
    expect(payload(toolError(new Error('disk on fire')))).toEqual({
      error: 'Unexpected failure',
      code: 'INTERNAL_ERROR',
      details: 'disk on fire',
      status: 500,
    });
  });
});
