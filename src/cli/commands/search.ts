/**
 * Search Command
 *
 * Ranks stored texts by cosine similarity to the query.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { SearchResponse } from '../../models/api-types.js';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';
import { parseCount } from '../utils/options.js';

interface SearchCommandOptions {
  topK: number;
  full?: boolean;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Find the stored texts most similar to a query')
    .argument('<query>', 'Search query')
    .option('-k, --top-k <n>', 'Maximum number of results', parseCount, 5)
    .option('--full', 'Show full texts instead of 300-character previews')
    .action(async (query: string, options: SearchCommandOptions) => {
      const started = Date.now();
      const result = await withRagContext((ctx) =>
        ctx.embeddings.search(query, options.topK, !options.full)
      );

      result.match(
        (response) => output.result(response, () => renderSearch(response, Date.now() - started)),
        fail('Search failed')
      );
    });
}

function renderSearch(response: SearchResponse, elapsedMs: number): void {
  console.log(chalk.cyan(`\nSearch: "${response.query}"`));
  console.log(chalk.gray(`Found ${response.results.length} results in ${elapsedMs}ms\n`));

  if (response.results.length === 0) {
    console.log(chalk.yellow('No results found'));
    return;
  }

  response.results.forEach((hit, i) => {
    console.log(
      chalk.bold.white(`${i + 1}. Embedding #${hit.id}`) +
        chalk.gray(` (similarity: ${hit.similarity.toFixed(3)})`)
    );
    console.log(chalk.gray(`   ${hit.text}`));
    console.log();
  });
}
