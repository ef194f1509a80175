import chalk from 'chalk';
import type { RagAnswer } from '../../models/rag.js';

/**
 * Collapse whitespace and cut to `maxChars` for table cells
 */
export function oneLine(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxChars ? `${flat.slice(0, maxChars - 3)}...` : flat;
}

/**
 * Print an answer followed by the passages it was grounded on
 */
export function renderAnswer(answer: RagAnswer): void {
  console.log(chalk.cyan(`\nQ: ${answer.question}\n`));
  console.log(answer.answer);
  console.log();

  if (!answer.usedRetrieval) {
    const reason = answer.retrievalAttempted
      ? 'No stored context found; answered without retrieval'
      : 'Answered without retrieval';
    console.log(chalk.gray(reason));
    return;
  }

  console.log(chalk.bold('Sources:'));
  answer.sources.forEach((source, i) => {
    console.log(`  ${chalk.dim(`${i + 1}.`)} ${source.label} ${chalk.gray(`(${source.similarityPercent})`)}`);
    if (source.link) {
      console.log(`     ${chalk.blue(source.link)}`);
    }
    console.log(chalk.gray(`     ${oneLine(source.preview, 100)}`));
  });
}
