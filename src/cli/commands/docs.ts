/**
 * Docs Command
 *
 * Uploads Markdown documents and answers questions from their chunks.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import chalk from 'chalk';
import { ValidationError, errorMessage } from '../../lib/errors.js';
import { fail, withRagContext } from '../utils/context.js';
import { parseCount } from '../utils/options.js';
import { output } from '../utils/output.js';
import { oneLine, renderAnswer } from '../utils/render.js';

interface DocsAskOptions {
  topK: number;
}

export function createDocsCommand(): Command {
  const command = new Command('docs').description('Manage uploaded Markdown documents');

  command
    .command('upload')
    .description('Chunk, embed and store a Markdown file')
    .argument('<file>', 'Path to a .md file')
    .action(async (file: string) => {
      let content: string;
      try {
        content = await readFile(file, 'utf8');
      } catch (error) {
        fail(`Failed to upload ${file}`)(new ValidationError(`Cannot read ${file}`, errorMessage(error)));
        return;
      }

      const spinner = output.spinner(`Embedding ${basename(file)}...`);
      const result = await withRagContext((ctx) => ctx.documents.upload(basename(file), content));
      spinner?.stop();

      result.match(
        (uploaded) =>
          output.result(uploaded, () =>
            output.success(`Uploaded ${uploaded.fileName} as document #${uploaded.documentId}`, {
              chunks: uploaded.chunksCreated,
              bytes: uploaded.fileSize,
            })
          ),
        fail(`Failed to upload ${file}`)
      );
    });

  command
    .command('list')
    .description('List uploaded documents')
    .action(async () => {
      const result = await withRagContext((ctx) => ctx.documents.list());

      result.match(
        (documents) =>
          output.result(documents, () => {
            if (documents.length === 0) {
              output.info('No documents uploaded');
              return;
            }
            output.table(
              ['ID', 'File', 'Bytes', 'Chunks', 'Created'],
              documents.map((d) => [d.id, d.fileName, d.fileSize, d.chunkCount, d.createdAt])
            );
          }),
        fail('Failed to list documents')
      );
    });

  command
    .command('show')
    .description('Show one document')
    .argument('<id>', 'Document id')
    .action(async (id: string) => {
      const result = await withRagContext((ctx) => ctx.documents.get(id));

      result.match(
        (document) =>
          output.result(document, () =>
            output.info(`Document #${document.id}`, {
              file: document.fileName,
              bytes: document.fileSize,
              chunks: document.chunkCount,
              created: document.createdAt,
            })
          ),
        fail(`Failed to show document ${id}`)
      );
    });

  command
    .command('chunks')
    .description('List the chunks of a document, or show one chunk')
    .argument('<id>', 'Document id')
    .argument('[index]', 'Chunk index (0-based)')
    .action(async (id: string, index: string | undefined) => {
      if (index !== undefined) {
        const result = await withRagContext((ctx) => ctx.documents.chunk(id, index));
        result.match(
          (chunk) =>
            output.result(chunk, () => {
              console.log(
                chalk.bold(`${chunk.documentName}, chunk ${chunk.chunkIndex + 1}`) +
                  chalk.gray(` [${chunk.startOffset}, ${chunk.endOffset}) ~${chunk.tokenCount} tokens`)
              );
              console.log();
              console.log(chunk.text);
            }),
          fail(`Failed to show chunk ${index} of document ${id}`)
        );
        return;
      }

      const result = await withRagContext((ctx) => ctx.documents.chunks(id));
      result.match(
        (chunks) =>
          output.result(chunks, () =>
            output.table(
              ['Index', 'Offsets', 'Tokens', 'Text'],
              chunks.map((c) => [
                c.chunkIndex,
                `${c.startOffset}-${c.endOffset}`,
                c.tokenCount,
                oneLine(c.text, 60),
              ])
            )
          ),
        fail(`Failed to list chunks of document ${id}`)
      );
    });

  command
    .command('delete')
    .description('Delete a document and its chunks')
    .argument('<id>', 'Document id')
    .action(async (id: string) => {
      const result = await withRagContext((ctx) => ctx.documents.delete(id));

      result.match(
        (deleted) => output.result(deleted, () => output.success(`Deleted document #${deleted.id}`)),
        fail(`Failed to delete document ${id}`)
      );
    });

  command
    .command('ask')
    .description('Answer a question from uploaded documents')
    .argument('<question>', 'Question to answer')
    .option('-k, --top-k <n>', 'Number of chunks to retrieve', parseCount, 3)
    .action(async (question: string, options: DocsAskOptions) => {
      const spinner = output.spinner('Thinking...');
      const result = await withRagContext((ctx) => ctx.documents.ask(question, options.topK));
      spinner?.stop();

      result.match(
        (answer) => output.result(answer, () => renderAnswer(answer)),
        fail('Question failed')
      );
    });

  command
    .command('stats')
    .description('Count documents and chunks')
    .action(async () => {
      const result = await withRagContext((ctx) => ctx.documents.stats());

      result.match(
        (stats) =>
          output.result(stats, () =>
            output.info('Document store', {
              documents: stats.totalDocuments,
              chunks: stats.totalChunks,
            })
          ),
        fail('Failed to read document stats')
      );
    });

  return command;
}
