/**
 * events.ts
 *
 * Append-only log of Redeem records, encoded as Clarity print events
 * for off-engine indexers.
 */

import { cvToJSON, stringAsciiCV, tupleCV, uintCV, type ClarityValue } from "@stacks/transactions";
import type { RedeemListener, RedeemRecord } from "@maturity/types";

/** Receives the error of a listener that threw while a record was published. */
export type ListenerErrorSink = (err: unknown, record: RedeemRecord) => void;

export interface RedeemLogOptions {
  onListenerError?: ListenerErrorSink;
}

export class RedeemLog {
  private entries: RedeemRecord[] = [];
  private readonly listeners = new Set<RedeemListener>();
  private readonly failures: unknown[] = [];
  private readonly onListenerError?: ListenerErrorSink;

  constructor(options: RedeemLogOptions = {}) {
    this.onListenerError = options.onListenerError;
  }

  get length(): number {
    return this.entries.length;
  }

  records(): readonly RedeemRecord[] {
    return this.entries.map((r) => ({ ...r }));
  }

  append(record: RedeemRecord): void {
    this.entries.push({ ...record });
  }

  /** Drop every record after the first `length`. Used to undo a failed call. */
  truncate(length: number): void {
    this.entries = this.entries.slice(0, length);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: RedeemListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deliver a committed record to subscribers. A listener that throws
   * does not stop the others; its error goes to `onListenerError` and
   * is kept in listenerErrors().
   */
  publish(record: RedeemRecord): void {
    for (const listener of this.listeners) {
      try {
        listener({ ...record });
      } catch (err) {
        this.failures.push(err);
        this.onListenerError?.(err, { ...record });
      }
    }
  }

  /** Errors thrown by listeners so far, oldest first. */
  listenerErrors(): readonly unknown[] {
    return [...this.failures];
  }
}

// -----------------------------------------------------------------------
// Clarity encoding
// -----------------------------------------------------------------------

/** `{ event: "redeem", from, to, amount }` as a Clarity tuple. */
export function toClarityValue(record: RedeemRecord): ClarityValue {
  return tupleCV({
    event: stringAsciiCV("redeem"),
    from: stringAsciiCV(record.from),
    to: stringAsciiCV(record.to),
    amount: uintCV(record.underlyingAmount),
  });
}

/** JSON form of the print event, as returned by a Stacks API node. */
export function toPrintEvent(record: RedeemRecord): ReturnType<typeof cvToJSON> {
  return cvToJSON(toClarityValue(record));
}
