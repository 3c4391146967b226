// backend/services/shared/http/faultLog.ts

/**
 * Purpose:
 * - Holds the most recent unhandled fault seen by the error stages so the
 *   diagnostic error route can surface it.
 *
 * Notes:
 * - One instance per app; never module-global.
 */

import { toError } from "./errors";

export type RecordedFault = {
  error: Error;
  at: string;
  requestId?: string;
};

export class FaultLog {
  #last: RecordedFault | undefined;
  #count = 0;

  public record(err: unknown, requestId?: string): RecordedFault {
    const entry: RecordedFault = {
      error: toError(err),
      at: new Date().toISOString(),
      requestId,
    };
    this.#last = entry;
    this.#count += 1;
    return entry;
  }

  public last(): RecordedFault | undefined {
    return this.#last;
  }

  /** Number of faults recorded since the app started. */
  public count(): number {
    return this.#count;
  }
}
