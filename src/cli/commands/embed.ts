/**
 * Embed Command
 *
 * Chunks, embeds and (unless --no-save) stores a text.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { EmbedResponse } from '../../models/api-types.js';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';
import { oneLine } from '../utils/render.js';

interface EmbedOptions {
  save: boolean;
}

export function createEmbedCommand(): Command {
  return new Command('embed')
    .description('Embed a text and store it for retrieval')
    .argument('<text>', 'Text to embed')
    .option('--no-save', 'Compute the embedding without storing it')
    .action(async (text: string, options: EmbedOptions) => {
      const spinner = output.spinner('Embedding text...');
      const result = await withRagContext((ctx) =>
        options.save ? ctx.embeddings.embed(text) : ctx.embeddings.embedQuery(text)
      );
      spinner?.stop();

      result.match(
        (response) => output.result(response, () => renderEmbedding(response)),
        fail('Embedding failed')
      );
    });
}

function renderEmbedding(response: EmbedResponse): void {
  const head = response.embedding.slice(0, 5).map((v) => v.toFixed(4)).join(', ');

  output.success(
    response.id === null ? 'Embedding computed (not saved)' : `Stored embedding #${response.id}`,
    {
      dimensions: response.embedding.length,
      chunks: response.chunks?.length ?? 1,
      vector: `[${head}, ...]`,
    }
  );

  if (response.chunks) {
    console.log();
    output.table(
      ['Chunk', 'Tokens', 'Preview'],
      response.chunks.map((c) => [c.index, c.tokenCount, chalk.gray(oneLine(c.preview, 60))])
    );
  }
}
