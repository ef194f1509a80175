import type { RagError } from '../../lib/errors.js';
import { createConfigManager } from '../../lib/env-config.js';
import { RagResult, err } from '../../lib/result-types.js';
import { createRagContext, type RagContext } from '../../services/rag-context.js';
import { output } from './output.js';

/**
 * Load `.env` and the environment, then open the database and build the services
 */
export function openRagContext(): RagResult<RagContext> {
  return createConfigManager()
    .load()
    .andThen((config) => createRagContext(config));
}

/**
 * Run one command against a fresh context, closing it afterwards
 */
export async function withRagContext<T>(
  action: (context: RagContext) => Promise<RagResult<T>> | RagResult<T>
): Promise<RagResult<T>> {
  const context = openRagContext();
  if (context.isErr()) {
    return err(context.error);
  }

  try {
    return await action(context.value);
  } finally {
    context.value.close();
  }
}

/**
 * Report a failed command and set a non-zero exit code
 */
export function fail(message: string) {
  return (error: RagError): void => {
    output.error(message, error);
    process.exitCode = 1;
  };
}
