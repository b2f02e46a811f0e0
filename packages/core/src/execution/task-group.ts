export type TaskOutcome<T> =
  | { readonly status: 'fulfilled'; readonly value: T }
  | { readonly status: 'failed'; readonly error: Error };

/**
 * Runs every task and joins once all of them have settled. A failing task
 * never cancels its siblings; outcomes keep submission order.
 */
export async function settleAll<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
): Promise<TaskOutcome<T>[]> {
  return Promise.all(tasks.map((task) => settle(task)));
}

export async function settle<T>(task: () => Promise<T>): Promise<TaskOutcome<T>> {
  try {
    return { status: 'fulfilled', value: await task() };
  } catch (error) {
    return {
      status: 'failed',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
