#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { output, OutputFormat } from './utils/output.js';
import { createInitCommand } from './commands/init.js';
import { createEmbedCommand } from './commands/embed.js';
import { createSearchCommand } from './commands/search.js';
import { createAskCommand } from './commands/ask.js';
import { createRecordsCommand } from './commands/records.js';
import { createDocsCommand } from './commands/docs.js';
import { createStatsCommand } from './commands/stats.js';
import { createHealthCommand } from './commands/health.js';
import { createServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('text-rag')
  .description('Embed texts and Markdown documents into SQLite and answer questions over them')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean; quiet?: boolean }>();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }

    // Read by the configuration loader when the command opens its context
    if (opts.verbose) {
      process.env.RAG_LOG_LEVEL = 'debug';
    }
    if (opts.quiet) {
      process.env.RAG_LOG_LEVEL = 'error';
      output.setQuiet(true);
    }
  });

program.exitOverride();

process.on('SIGINT', () => {
  console.error('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

program.addCommand(createInitCommand());
program.addCommand(createEmbedCommand());
program.addCommand(createSearchCommand());
program.addCommand(createAskCommand());
program.addCommand(createRecordsCommand());
program.addCommand(createDocsCommand());
program.addCommand(createStatsCommand());
program.addCommand(createHealthCommand());
program.addCommand(createServeCommand());

try {
  await program.parseAsync(process.argv);
} catch (error) {
  // Commander has already printed usage errors, help and version
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  output.error('Unexpected error', error);
  process.exit(1);
}
