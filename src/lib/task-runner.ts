/**
 * Ordered task runner
 *
 * Runs Result-returning tasks with bounded parallelism (p-limit) and
 * reassembles their values in input order.
 */

import pLimit from 'p-limit';
import { Result, err, ok } from './result-types.js';

/**
 * Map `items` through `task`, at most `concurrency` at a time
 *
 * The first failure to occur is returned; tasks that have not started by
 * then are skipped. With `concurrency = 1` execution is strictly sequential.
 */
export async function mapInOrder<T, R, E>(
	items: readonly T[],
	task: (item: T, index: number) => Promise<Result<R, E>>,
	concurrency = 1
): Promise<Result<R[], E>> {
	const limit = pLimit(Math.max(1, Math.floor(concurrency)));
	const state: { failure?: { error: E } } = {};

	const outcomes = await Promise.all(
		items.map((item, index) =>
			limit(async (): Promise<Result<R, E> | undefined> => {
				if (state.failure !== undefined) {
					return undefined;
				}

				const result = await task(item, index);
				if (result.isErr() && state.failure === undefined) {
					state.failure = { error: result.error };
				}
				return result;
			})
		)
	);

	if (state.failure !== undefined) {
		return err(state.failure.error);
	}

	const values: R[] = [];
	for (const outcome of outcomes) {
		if (outcome === undefined) {
			continue;
		}
		if (outcome.isErr()) {
			return err(outcome.error);
		}
		values.push(outcome.value);
	}

	return ok(values);
}
