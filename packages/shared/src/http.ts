/**
 * @layover/shared -- helpers shared by the HTTP clients.
 */

/**
 * Settle with `read`, or reject once `signal` aborts, whichever comes
 * first. Lets a request's timeout also bound the response body read when
 * the fetch implementation does not tie the body to the signal.
 */
export function untilAborted<T>(read: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error("The operation was aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) onAbort();

    read.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
