/**
 * MCP (Model Context Protocol) Server Implementation
 *
 * Exposes the embedding and document operations as tools via JSON-RPC 2.0
 * over stdio transport.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../lib/logger.js';
import { RagToolHandler, type RagServices } from './rag-tools.js';

export interface MCPServerOptions {
  name?: string;
  version?: string;
  /** Runs once after the transport closes or a termination signal arrives */
  onShutdown?: () => void;
}

/**
 * MCP Server for retrieval-augmented question answering
 */
export class MCPServer {
  private server: Server;
  private handler: RagToolHandler;
  private activeRequests = new Set<Promise<unknown>>();
  private shuttingDown = false;

  constructor(services: RagServices, private readonly options: MCPServerOptions = {}) {
    this.handler = new RagToolHandler(services);

    this.server = new Server(
      {
        name: options.name ?? 'text-rag-mcp',
        version: options.version ?? '1.0.0'
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.setupHandlers();
  }

  /**
   * Setup tool handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.handler.listTools()
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      const promise = this.handler.callTool(name, args);
      this.activeRequests.add(promise);

      try {
        return await promise;
      } finally {
        this.activeRequests.delete(promise);
      }
    });
  }

  /**
   * Wait (bounded) for in-flight calls, then release resources
   */
  async shutdown(timeoutMs = 10_000): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.info('Shutting down MCP server', { activeRequests: this.activeRequests.size });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([Promise.allSettled([...this.activeRequests]), timeout]);
    clearTimeout(timer);

    await this.server.close();
    this.options.onShutdown?.();
  }

  /**
   * Start the MCP server on stdio
   */
  async start(): Promise<void> {
    this.server.onclose = () => {
      this.shutdown().catch((error: unknown) => {
        logger.error('MCP server shutdown failed', {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    };

    await this.server.connect(new StdioServerTransport());

    logger.info('MCP server started and listening on stdio', {
      tools: this.handler.listTools().length
    });
  }
}
