/**
 * Records Command
 *
 * Lists, shows and deletes stored embeddings.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';
import { oneLine } from '../utils/render.js';

export function createRecordsCommand(): Command {
  const command = new Command('records').description('Manage stored embeddings');

  command
    .command('list')
    .description('List every stored text')
    .action(async () => {
      const result = await withRagContext((ctx) => ctx.embeddings.list());

      result.match(
        (records) =>
          output.result(records, () => {
            if (records.length === 0) {
              output.info('No embeddings stored');
              return;
            }
            output.table(
              ['ID', 'Created', 'Dims', 'Text'],
              records.map((r) => [r.id, r.createdAt, r.embedding.length, oneLine(r.text, 60)])
            );
          }),
        fail('Failed to list embeddings')
      );
    });

  command
    .command('show')
    .description('Show one stored text')
    .argument('<id>', 'Embedding id')
    .action(async (id: string) => {
      const result = await withRagContext((ctx) => ctx.embeddings.get(id));

      result.match(
        (record) =>
          output.result(record, () => {
            console.log(chalk.bold(`Embedding #${record.id}`) + chalk.gray(` (${record.createdAt})`));
            console.log(chalk.gray(`Dimensions: ${record.embedding.length}`));
            console.log();
            console.log(record.text);
          }),
        fail(`Failed to show embedding ${id}`)
      );
    });

  command
    .command('delete')
    .description('Delete one stored text')
    .argument('<id>', 'Embedding id')
    .action(async (id: string) => {
      const result = await withRagContext((ctx) => ctx.embeddings.delete(id));

      result.match(
        (deleted) => output.result(deleted, () => output.success(`Deleted embedding #${deleted.id}`)),
        fail(`Failed to delete embedding ${id}`)
      );
    });

  return command;
}
