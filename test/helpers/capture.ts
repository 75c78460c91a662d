/**
 * Run `fn` and return whatever it throws. Fails the test if nothing is thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
