export const FIRST_HOST_OCTET = 2;
export const LAST_HOST_OCTET = 254;

/** Last octet of `a.b.c.d` or `a.b.c.d/nn`; null when the address is not IPv4. */
export function lastOctet(address: string): number | null {
  const host = address.split('/')[0];
  const parts = host.split('.');
  if (parts.length !== 4) {
    return null;
  }
  const octet = parseInt(parts[3], 10);
  return Number.isNaN(octet) ? null : octet;
}

/**
 * Lowest free host octet in 2..254 given the octets already taken, so freed
 * addresses are reused before the pool grows. Null when the pool is full.
 */
export function allocateHostOctet(taken: Iterable<number>): number | null {
  const used = new Set(taken);
  for (let octet = FIRST_HOST_OCTET; octet <= LAST_HOST_OCTET; octet++) {
    if (!used.has(octet)) {
      return octet;
    }
  }
  return null;
}
