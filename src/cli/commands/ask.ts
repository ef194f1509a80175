/**
 * Ask Command
 *
 * Answers a question, grounded in the stored texts unless --no-retrieval.
 */

import { Command } from 'commander';
import { fail, withRagContext } from '../utils/context.js';
import { parseCount } from '../utils/options.js';
import { output } from '../utils/output.js';
import { renderAnswer } from '../utils/render.js';

interface AskOptions {
  topK: number;
  retrieval: boolean;
}

export function createAskCommand(): Command {
  return new Command('ask')
    .description('Answer a question using the most similar stored texts as context')
    .argument('<question>', 'Question to answer')
    .option('-k, --top-k <n>', 'Number of passages to retrieve', parseCount, 3)
    .option('--no-retrieval', 'Ask the model directly, without stored context')
    .action(async (question: string, options: AskOptions) => {
      const spinner = output.spinner('Thinking...');
      const result = await withRagContext((ctx) =>
        ctx.embeddings.answer(question, options.retrieval, options.topK)
      );
      spinner?.stop();

      result.match(
        (answer) => output.result(answer, () => renderAnswer(answer)),
        fail('Question failed')
      );
    });
}
