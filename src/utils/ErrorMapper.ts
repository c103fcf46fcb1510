/**
 * @fileoverview Error reporting for entry points.
 *
 * Scripts wrap their main function so a bad network file or an unstable
 * run is logged and turned into a non-zero exit code instead of an
 * unhandled rejection.
 *
 * @module utils/ErrorMapper
 */

import { isFlowError } from "../errors/FlowErrors";

export const ErrorMapper = {
  /**
   * Renders an error as a single log block. Engine errors show their kind
   * and details; other errors their stack.
   */
  describe(e: unknown): string {
    if (isFlowError(e)) {
      const details = Object.keys(e.details).length > 0 ? ` ${JSON.stringify(e.details)}` : "";
      return `${e.kind}: ${e.message}${details}`;
    }
    if (e instanceof Error) {
      return `${e.message}\n${e.stack ?? ""}`;
    }
    return String(e);
  },

  /**
   * Wraps an async main function.
   *
   * @example
   * void ErrorMapper.wrapMain(async () => {
   *   // script body
   * })();
   */
  wrapMain(fn: () => Promise<void>, log: (line: string) => void = console.error): () => Promise<void> {
    return async () => {
      try {
        await fn();
      } catch (e) {
        log(`Error in main: ${ErrorMapper.describe(e)}`);
        process.exitCode = 1;
      }
    };
  },
};
