import { OracleTimeoutError } from "../runtime/errors.js";
import type { FixOracle, OracleRequest } from "./types.js";

/**
 * Races the oracle against a deadline. The oracle's own signal fires on either
 * the deadline or the caller's abort, so an abandoned call stops as well.
 */
export const proposeWithTimeout = async (
  oracle: FixOracle,
  request: OracleRequest,
  opts: { timeoutMs: number; signal?: AbortSignal }
): Promise<string> => {
  opts.signal?.throwIfAborted();

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OracleTimeoutError(opts.timeoutMs);
      controller.abort(error);
      reject(error);
    }, opts.timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([oracle.propose(request, { signal: controller.signal }), deadline, cancelled]);
  } catch (error) {
    // past the deadline every rejection is reported as the timeout
    if (controller.signal.reason instanceof OracleTimeoutError) throw controller.signal.reason;
    throw error;
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", forwardAbort);
  }
};
