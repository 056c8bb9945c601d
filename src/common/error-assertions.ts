export function getErrorInfo(e: unknown): { message: string; stack?: string } {
  if (e instanceof Error) return { message: e.message, stack: e.stack };
  if (typeof e === 'string') return { message: e };
  try {
    return { message: JSON.stringify(e) };
  } catch {
    return { message: String(e) };
  }
}

/** The message of an error and of each `cause` below it, outermost first. */
export function describeErrorChain(e: unknown): string {
  const parts: string[] = [];
  let current: unknown = e;
  while (current !== undefined && parts.length < 5) {
    parts.push(getErrorInfo(current).message);
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(': ');
}
