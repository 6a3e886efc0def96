import { IncomingMessage } from "http";

const requestStartTimes = new WeakMap<IncomingMessage, number>();

export function markRequestStart(raw: IncomingMessage, startTime: number = Date.now()): void {
  requestStartTimes.set(raw, startTime);
}

/**
 * Returns the time the request was first seen by the logging interceptor and forgets it.
 */
export function takeRequestStart(raw: IncomingMessage): number | undefined {
  const startTime = requestStartTimes.get(raw);
  requestStartTimes.delete(raw);
  return startTime;
}
