import { Command } from 'commander';
import chalk from 'chalk';
import { MCPServer } from '../../services/mcp-server.js';
import { RAG_TOOLS } from '../../services/rag-tools.js';
import { fail, openRagContext } from '../utils/context.js';

/**
 * Create the serve command
 *
 * Starts the MCP (Model Context Protocol) server on stdio. Everything but
 * JSON-RPC goes to stderr; the database closes when the transport does.
 */
export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the MCP tool server (stdio transport)')
    .action(async () => {
      const context = openRagContext();
      if (context.isErr()) {
        fail('Failed to start MCP server')(context.error);
        return;
      }

      const ctx = context.value;
      const server = new MCPServer(
        { embeddings: ctx.embeddings, documents: ctx.documents },
        { onShutdown: () => ctx.close() }
      );

      process.stderr.write(chalk.green('✓ MCP server starting...\n'));
      process.stderr.write(chalk.gray(`  Database: ${ctx.config.database.path}\n`));
      process.stderr.write(chalk.gray(`  Model backend: ${ctx.gateway.id}\n`));
      process.stderr.write(chalk.gray('\nAvailable tools:\n'));
      for (const tool of RAG_TOOLS) {
        process.stderr.write(chalk.gray(`  • ${tool.name.padEnd(18)}- ${tool.description}\n`));
      }
      process.stderr.write(chalk.gray('\nListening on stdio for JSON-RPC 2.0 requests...\n\n'));

      try {
        await server.start();
      } catch (error) {
        ctx.close();
        process.stderr.write(
          chalk.red(`\n✗ Failed to start MCP server: ${error instanceof Error ? error.message : String(error)}\n\n`)
        );
        process.exitCode = 1;
      }
    });
}
