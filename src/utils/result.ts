export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface NotFound {
  kind: 'NotFound';
  name: string;
}

export interface AlreadyExists {
  kind: 'AlreadyExists';
  field: 'name' | 'public_key' | 'address';
  value: string;
}

export interface CommandFailed {
  kind: 'CommandFailed';
  command: string;
  exitCode: number;
  stderr: string;
}
