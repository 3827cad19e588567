/**
 * Migration Rendezvous: two-phase handshake between requester and preparer.
 *
 * Phase 1: the preparer calls completeCapture(), releasing the requester.
 * Phase 2: the requester calls release() once the result is delivered,
 * letting the preparer finalize the pod.
 *
 * Each signal fires exactly once. Firing twice, firing out of order or
 * firing after abandon() throws RendezvousError instead of being ignored.
 */

import type { RendezvousState, ReleaseOutcome } from "./types.js";
import { VALID_RENDEZVOUS_TRANSITIONS } from "./types.js";

export interface Rendezvous {
  readonly state: RendezvousState;
  /** Aborted when the rendezvous is abandoned. */
  readonly signal: AbortSignal;
  /** Fired by the preparer once every checkpoint is written. */
  completeCapture(): void;
  /** Fired by the requester after the result has been delivered. */
  release(): void;
  /** Give up on the migration; the preparer is let go without a delivered result. */
  abandon(reason: string): void;
  /** Resolves on capture; rejects with RendezvousError if abandoned first. */
  waitForCapture(): Promise<void>;
  /** Resolves once released or abandoned. Never rejects. */
  waitForRelease(): Promise<ReleaseOutcome>;
}

export class RendezvousError extends Error {
  readonly from: RendezvousState;
  readonly to: RendezvousState;

  constructor(from: RendezvousState, to: RendezvousState, message: string) {
    super(message);
    this.name = "RendezvousError";
    this.from = from;
    this.to = to;
  }
}

interface CaptureWaiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

export function createRendezvous(): Rendezvous {
  let state: RendezvousState = "AWAITING_CAPTURE";
  let abandonReason = "";
  const controller = new AbortController();
  const captureWaiters: CaptureWaiter[] = [];
  const releaseWaiters: Array<(outcome: ReleaseOutcome) => void> = [];

  function transition(to: RendezvousState): void {
    const allowed = VALID_RENDEZVOUS_TRANSITIONS[state];
    if (!allowed.includes(to)) {
      throw new RendezvousError(
        state,
        to,
        `Invalid rendezvous transition: ${state} → ${to}. ` +
        `Allowed: ${allowed.join(", ") || "(none, terminal state)"}`,
      );
    }
    state = to;
  }

  function completeCapture(): void {
    transition("CAPTURE_COMPLETE");
    for (const waiter of captureWaiters.splice(0)) waiter.resolve();
  }

  function release(): void {
    transition("RELEASED");
    for (const resolve of releaseWaiters.splice(0)) resolve("released");
  }

  function abandon(reason: string): void {
    transition("ABANDONED");
    abandonReason = reason;
    controller.abort(new Error(reason));
    for (const waiter of captureWaiters.splice(0)) waiter.reject(abandonedError());
    for (const resolve of releaseWaiters.splice(0)) resolve("abandoned");
  }

  function abandonedError(): RendezvousError {
    return new RendezvousError("ABANDONED", "CAPTURE_COMPLETE", `Migration abandoned: ${abandonReason}`);
  }

  function waitForCapture(): Promise<void> {
    switch (state) {
      case "CAPTURE_COMPLETE":
      case "RELEASED":
        return Promise.resolve();
      case "ABANDONED":
        return Promise.reject(abandonedError());
      case "AWAITING_CAPTURE":
        return new Promise((resolve, reject) => {
          captureWaiters.push({ resolve, reject });
        });
    }
  }

  function waitForRelease(): Promise<ReleaseOutcome> {
    if (state === "RELEASED") return Promise.resolve("released");
    if (state === "ABANDONED") return Promise.resolve("abandoned");
    return new Promise((resolve) => {
      releaseWaiters.push(resolve);
    });
  }

  return {
    get state() {
      return state;
    },
    signal: controller.signal,
    completeCapture,
    release,
    abandon,
    waitForCapture,
    waitForRelease,
  };
}
