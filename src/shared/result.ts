export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: (error: E) => T): T {
  return result.ok ? result.value : fallback(result.error);
}

export class ParseError {
  constructor(
    public readonly message: string,
    public readonly raw: string
  ) {}
}
