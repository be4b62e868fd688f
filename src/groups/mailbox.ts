export type MailboxRead<T> =
  | { kind: "empty" }
  | { kind: "value"; value: T; published_at_ms: number }
  | { kind: "error"; error: Error; failed_at_ms: number };

/**
 * Single-slot hand-off between one writer and many readers. The slot holds
 * whichever came last: a value or an error. Reads never wait.
 */
export class LatestMailbox<T> {
  private slot: MailboxRead<T> = { kind: "empty" };

  publish(value: T, nowMs = Date.now()): void {
    this.slot = { kind: "value", value, published_at_ms: nowMs };
  }

  fail(error: Error, nowMs = Date.now()): void {
    this.slot = { kind: "error", error, failed_at_ms: nowMs };
  }

  read(): MailboxRead<T> {
    return this.slot;
  }
}

/** Latest published groups; empty before the first refresh; throws the stored refresh error. */
export function readLatest<T>(mailbox: LatestMailbox<T[]>): T[] {
  const slot = mailbox.read();
  switch (slot.kind) {
    case "error":
      throw slot.error;
    case "empty":
      return [];
    case "value":
      return slot.value;
  }
}
