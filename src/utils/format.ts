const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

/** Relative age of a unix-seconds timestamp; 0 means never. */
export function formatHandshakeAge(latestHandshake: number, nowSeconds: number = Math.floor(Date.now() / 1000)): string {
  if (latestHandshake <= 0) {
    return 'never';
  }
  const age = Math.max(0, nowSeconds - latestHandshake);
  if (age < 60) {
    return `${age}s ago`;
  }
  if (age < 3600) {
    return `${Math.floor(age / 60)}m ago`;
  }
  if (age < 86400) {
    return `${Math.floor(age / 3600)}h ago`;
  }
  return `${Math.floor(age / 86400)}d ago`;
}
