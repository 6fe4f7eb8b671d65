/**
 * Run one async task per item, either all at once or strictly one after another
 */
export async function runEach<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  sequential: boolean
): Promise<R[]> {
  if (!sequential) {
    return Promise.all(items.map((item, index) => task(item, index)));
  }

  const results: R[] = [];
  for (let i = 0; i < items.length; i++) {
    results.push(await task(items[i], i));
  }
  return results;
}
