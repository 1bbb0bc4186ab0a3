export const ONLINE_WINDOW_SECONDS = 300;

/** A peer is online when it has completed a handshake within the window. */
export function isPeerOnline(latestHandshake: number, nowSeconds: number, windowSeconds = ONLINE_WINDOW_SECONDS): boolean {
  return latestHandshake > 0 && nowSeconds - latestHandshake < windowSeconds;
}

export type SessionTransition = { kind: 'start'; at: Date } | { kind: 'end'; at: Date } | { kind: 'none' };

/**
 * Both edges are stamped with the handshake time when there is one, so a
 * session ends when the peer was last seen rather than when the tick noticed.
 */
export function decideSessionTransition(
  online: boolean,
  hasActiveSession: boolean,
  latestHandshake: number,
  now: Date
): SessionTransition {
  const at = latestHandshake > 0 ? new Date(latestHandshake * 1000) : now;
  if (online && !hasActiveSession) {
    return { kind: 'start', at };
  }
  if (!online && hasActiveSession) {
    return { kind: 'end', at };
  }
  return { kind: 'none' };
}
