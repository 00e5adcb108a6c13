/**
 * Run `fn` and return what it threw. Fails the test when nothing is thrown.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected the call to throw');
}
