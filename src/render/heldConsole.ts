type LogMethod = 'info' | 'warn';

type LogTarget = Pick<Console, LogMethod>;

/**
 * Holds log output while the terminal frame owns the screen. The returned
 * function restores the console and replays what was held, in order.
 */
export function holdConsole(
  target: LogTarget = console,
  methods: readonly LogMethod[] = ['info', 'warn'],
): () => void {
  const held: { method: LogMethod; args: unknown[] }[] = [];
  const originals = methods.map((method) => ({ method, fn: target[method] }));

  for (const method of methods) {
    target[method] = (...args: unknown[]) => {
      held.push({ method, args });
    };
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    for (const { method, fn } of originals) target[method] = fn;
    for (const { method, args } of held) target[method](...args);
  };
}
