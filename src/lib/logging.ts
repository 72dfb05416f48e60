// console.error, with a trailing Error expanded to its message and stack.
export function logError(...input: unknown[]): void {
  let last = input.at(-1);
  if (!(last instanceof Error)) {
    if (input.length > 0) console.error(...input);
    return;
  }
  console.error(...input.slice(0, -1), describeError(last));
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error);
}

function describeError(error: Error): string {
  let stack = error.stack ?? '';
  if (stack === '' || stack === error.message) return error.message;
  return error.message ? `${error.message}\n${stack}` : stack;
}
