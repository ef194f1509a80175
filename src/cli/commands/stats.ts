/**
 * Stats Command
 */

import { Command } from 'commander';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Count stored texts and show the chunk settings')
    .action(async () => {
      const result = await withRagContext((ctx) => ctx.embeddings.stats());

      result.match(
        (stats) =>
          output.result(stats, () => {
            const c = stats.chunkSettings;
            output.info('Embedding store', {
              embeddings: stats.totalEmbeddings,
              normalization: stats.normalization,
              chunk_tokens: `${c.minTokens}-${c.maxTokens} (overlap ${c.overlapTokens})`,
              chunk_chars: `${c.minChars}-${c.maxChars} (overlap ${c.overlapChars})`,
              chars_per_token: c.charsPerToken,
            });
          }),
        fail('Failed to read stats')
      );
    });
}
