import { CounterDelta } from '../../database/models';

export interface CounterSample {
  bytesReceived: number;
  bytesSent: number;
}

/**
 * Traffic since the previous sample. With no baseline the sample only seeds
 * one, so nothing is attributed. A counter below its baseline means the
 * interface was reset, and the whole current value is new traffic.
 * Each direction is handled on its own.
 */
export function computeCounterDelta(baseline: CounterSample | null, current: CounterSample): CounterDelta {
  if (!baseline) {
    return { deltaReceived: 0, deltaSent: 0 };
  }
  return {
    deltaReceived: directionDelta(baseline.bytesReceived, current.bytesReceived),
    deltaSent: directionDelta(baseline.bytesSent, current.bytesSent),
  };
}

function directionDelta(previous: number, current: number): number {
  return current >= previous ? current - previous : current;
}
