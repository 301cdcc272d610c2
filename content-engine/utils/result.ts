// Shared result and error value types for content-engine modules

export type ModuleError = {
  code: string;
  module: string;
  message: string;
  data?: Record<string, unknown>;
};

export type Result<T, E> = {
  isSuccess(): this is { value: T };
  isError(): this is { errors: E };
  value?: T;
  errors?: E;
};

class Outcome<T, E> implements Result<T, E> {
  constructor(private readonly ok: boolean, readonly value?: T, readonly errors?: E) {}

  isSuccess(): this is { value: T } {
    return this.ok;
  }

  isError(): this is { errors: E } {
    return !this.ok;
  }
}

export function Ok<T>(value: T): Result<T, never> {
  return new Outcome<T, never>(true, value);
}

export function Err<E>(errors: E): Result<never, E> {
  return new Outcome<never, E>(false, undefined, errors);
}

/**
 * Build a ModuleError with the E-<MODULE>-<REASON> code convention
 */
export function moduleError(
  module: string,
  reason: string,
  message: string,
  data?: Record<string, unknown>
): ModuleError {
  return {
    code: `E-${module.toUpperCase()}-${reason.toUpperCase()}`,
    module,
    message,
    ...(data ? { data } : {}),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
