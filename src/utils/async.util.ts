import { DeadlineExceededError } from "../errors/app.errors";

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleeper = (ms: number) => Promise<void>;

/**
 * Race a promise against a deadline. Expiry rejects with a
 * DeadlineExceededError; the underlying call is not aborted.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  deadlineMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new DeadlineExceededError(label, deadlineMs)),
      deadlineMs,
    );
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
