/** Runs `fn` and returns whatever it threw, or undefined when it returned normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
