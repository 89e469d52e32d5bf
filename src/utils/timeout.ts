export class CollaboratorTimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}

/**
 * Rejects with CollaboratorTimeoutError when `work` has not settled within
 * `timeoutMs`. A non-positive timeout disables the limit.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  if (!(timeoutMs > 0)) return work;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CollaboratorTimeoutError(label, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
