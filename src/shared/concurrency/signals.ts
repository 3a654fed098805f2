/**
 * Resolves `true` once `signal` aborts, or `false` if `cancel` aborts first.
 */
export const waitForAbort = (
  signal: AbortSignal,
  cancel?: AbortSignal,
): Promise<boolean> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve(true);
      return;
    }
    if (cancel?.aborted) {
      resolve(false);
      return;
    }

    const finish = (value: boolean): void => {
      signal.removeEventListener("abort", onAbort);
      cancel?.removeEventListener("abort", onCancel);
      resolve(value);
    };
    const onAbort = (): void => finish(true);
    const onCancel = (): void => finish(false);

    signal.addEventListener("abort", onAbort, { once: true });
    cancel?.addEventListener("abort", onCancel, { once: true });
  });
