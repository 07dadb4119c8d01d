/**
 * Server logging.
 * devLog is for development chatter only; logError always reports unless running under tests.
 */
export function devLog(...args: unknown[]): void {
  const env = process.env.NODE_ENV;
  if (env !== 'production' && env !== 'test') {
    console.log(...args);
  }
}

export function logError(...args: unknown[]): void {
  if (process.env.NODE_ENV !== 'test') {
    console.error(...args);
  }
}
