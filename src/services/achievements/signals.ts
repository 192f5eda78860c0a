/**
 * Minimal in-process publish/subscribe.
 *
 * Each Signal keeps its own ordered receiver list. A receiver is registered
 * either for one sender or, when no sender is given, for every sender. The
 * registration key is (dispatchUid or the receiver itself, sender), and
 * connecting an existing key again does nothing.
 *
 * Delivery is synchronous, on the caller's turn, in registration order:
 *   - send():       a throwing receiver stops delivery and the error propagates
 *   - sendRobust(): every receiver runs; failures are returned, not thrown
 *
 * Both work on a snapshot of the matching receivers, so a receiver that
 * connects or disconnects while handling a signal changes the next delivery,
 * not the one in progress.
 */

import type { GoalsAchievedEvent, ProgressEvent } from "./types";

export type SignalPayload<TArgs extends object> = TArgs & {
  signal: Signal<TArgs>;
  sender: unknown;
};

export type Receiver<TArgs extends object> = (payload: SignalPayload<TArgs>) => unknown;

export interface ConnectOptions {
  /** Only deliver signals sent by this sender (by identity). Omit for any sender. */
  sender?: unknown;
  /** Stable registration id; replaces the receiver identity in the lookup key */
  dispatchUid?: string;
}

export interface DisconnectOptions<TArgs extends object> extends ConnectOptions {
  receiver?: Receiver<TArgs>;
}

export interface SignalResult<TArgs extends object> {
  receiver: Receiver<TArgs>;
  value: unknown;
}

export type RobustSignalResult<TArgs extends object> =
  | { receiver: Receiver<TArgs>; ok: true; value: unknown }
  | { receiver: Receiver<TArgs>; ok: false; error: Error };

interface Registration<TArgs extends object> {
  id: unknown;
  sender: unknown;
  receiver: Receiver<TArgs>;
}

export class Signal<TArgs extends object> {
  readonly name: string;
  private registrations: Registration<TArgs>[] = [];

  constructor(name: string) {
    this.name = name;
  }

  connect(receiver: Receiver<TArgs>, options: ConnectOptions = {}): void {
    const id = options.dispatchUid ? options.dispatchUid : receiver;
    if (this.indexOf(id, options.sender) === -1) {
      this.registrations.push({ id, sender: options.sender, receiver });
    }
  }

  /** Returns true when a registration was removed. */
  disconnect(options: DisconnectOptions<TArgs>): boolean {
    const id = options.dispatchUid ? options.dispatchUid : options.receiver;
    const index = this.indexOf(id, options.sender);
    if (index === -1) {
      return false;
    }
    this.registrations.splice(index, 1);
    return true;
  }

  hasListeners(sender?: unknown): boolean {
    return this.receiversFor(sender).length > 0;
  }

  send(sender: unknown, args: TArgs): SignalResult<TArgs>[] {
    const payload = this.payload(sender, args);
    return this.receiversFor(sender).map((receiver) => ({
      receiver,
      value: receiver(payload),
    }));
  }

  sendRobust(sender: unknown, args: TArgs): RobustSignalResult<TArgs>[] {
    const payload = this.payload(sender, args);
    return this.receiversFor(sender).map((receiver): RobustSignalResult<TArgs> => {
      try {
        return { receiver, ok: true, value: receiver(payload) };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        return { receiver, ok: false, error };
      }
    });
  }

  private payload(sender: unknown, args: TArgs): SignalPayload<TArgs> {
    return { ...args, signal: this, sender };
  }

  private indexOf(id: unknown, sender: unknown): number {
    return this.registrations.findIndex((r) => r.id === id && r.sender === sender);
  }

  private receiversFor(sender: unknown): Receiver<TArgs>[] {
    return this.registrations
      .filter((r) => r.sender === undefined || r.sender === sender)
      .map((r) => r.receiver);
  }
}

/** The three signals a tracker emits. */
export interface AchievementSignals {
  levelIncreased: Signal<ProgressEvent>;
  goalAchieved: Signal<GoalsAchievedEvent>;
  highestLevelAchieved: Signal<ProgressEvent>;
}

export function createAchievementSignals(): AchievementSignals {
  return {
    levelIncreased: new Signal<ProgressEvent>("levelIncreased"),
    goalAchieved: new Signal<GoalsAchievedEvent>("goalAchieved"),
    highestLevelAchieved: new Signal<ProgressEvent>("highestLevelAchieved"),
  };
}
