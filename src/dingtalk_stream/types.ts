export type SubscriptionKind = "EVENT" | "SYSTEM" | "CALLBACK";

export type StreamSubscription = { type: SubscriptionKind; topic: string };

export type ConnectionState = "Disconnected" | "Connecting" | "Connected";

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

/**
 * Host-provided background scheduler. Tasks must be run to completion independently of the caller.
 */
export interface TaskScheduler {
  spawn(task: () => Promise<void>): void;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };
