/**
 * Init Command
 *
 * Creates the database, applies migrations and writes a starter .env file.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { ValidationError, errorMessage } from '../../lib/errors.js';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';

interface InitOptions {
  env?: boolean;
}

const STARTER_ENV = `# text-rag settings; every value shown is the default
RAG_DB_PATH=.textrag/rag.db
RAG_LOG_DIR=.textrag/logs
RAG_LOG_LEVEL=warn
OLLAMA_BASE_URL=http://localhost:11434
OLLAMA_EMBED_MODEL=nomic-embed-text
OLLAMA_CHAT_MODEL=qwen2.5:1.5b
RAG_CHUNK_MIN_TOKENS=500
RAG_CHUNK_MAX_TOKENS=1000
RAG_CHUNK_OVERLAP_TOKENS=75
`;

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the database and apply migrations')
    .option('--env', 'Also write a starter .env file if none exists')
    .action(async (options: InitOptions) => {
      let envWritten = false;
      if (options.env && !existsSync('.env')) {
        try {
          await writeFile('.env', STARTER_ENV, 'utf8');
          envWritten = true;
        } catch (error) {
          fail('Failed to initialize')(new ValidationError('Cannot write .env', errorMessage(error)));
          return;
        }
      }

      const result = await withRagContext((ctx) => ctx.embeddings.stats().map((stats) => ({
        database: ctx.config.database.path,
        schemaVersion: ctx.database.getStats().schemaVersion,
        embeddings: stats.totalEmbeddings,
        envWritten,
      })));

      result.match(
        (summary) =>
          output.result(summary, () =>
            output.success('Initialized text-rag', {
              database: summary.database,
              schema_version: summary.schemaVersion,
              embeddings: summary.embeddings,
              env_written: summary.envWritten,
            })
          ),
        fail('Failed to initialize')
      );
    });
}
