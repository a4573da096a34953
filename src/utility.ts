import * as Sentry from "@sentry/node";
import zod from "zod";

export abstract class Result<T> {
  static of = <T>(value: T): Ok<T> => Ok.of(value);
  static throw = (error: Error | string): Err => Err.throw(error);
  static try = <T, Args extends unknown[]>(
    fn: (...args: Args) => T,
    ...args: Args
  ): Result<T> => {
    try {
      return Ok.of(fn(...args));
    } catch (error) {
      return Err.throw(error instanceof Error ? error : String(error));
    }
  };

  abstract isOk(): this is Ok<T>;
  abstract flat(): T;
  abstract fold<U>(onOk: (value: T) => U, onErr: (error: Error) => U): U;
  abstract map<U>(fn: (value: T) => U): Result<U>;
  abstract catch<U>(fn: (error: Error) => U): Ok<T | U>;

  flatMap = <U>(fn: (value: T) => Result<U>): Result<U> =>
    this.fold<Result<U>>(fn, error => Err.throw(error));
}

export class Ok<T> extends Result<T> {
  private readonly value: T;

  private constructor(value: T) {
    super();
    this.value = value;
  }

  static of = <T>(value: T): Ok<T> => new Ok(value);

  isOk = (): this is Ok<T> => true;
  map = <U>(fn: (value: T) => U): Ok<U> => Ok.of(fn(this.value));
  catch = (): Ok<T> => this;
  fold = <U>(fn: (value: T) => U): U => fn(this.value);
  flat = (): T => this.value;
}

export class Err extends Result<never> {
  private readonly error: Error;

  private constructor(error: Error | string) {
    super();
    this.error = typeof error === "string" ? new Error(error) : error;
  }

  static throw = (error: Error | string): Err => new Err(error);

  isOk = (): this is Ok<never> => false;
  map = <U>(_: (value: never) => U): Err => this;
  catch: <U>(fn: (error: Error) => U) => Ok<U> = fn => Ok.of(fn(this.error));
  fold = <U>(_: never, onErr: (error: Error) => U): U => onErr(this.error);
  flat = (): never => {
    throw this.error;
  };
}

/**
 * Validates `value` against a zod schema. Validation failures are reported
 * to Sentry and returned as an `Err` carrying the `ZodError`.
 */
export const safeParse = <T extends zod.ZodType>(
  value: unknown,
  schema: T
): Result<zod.infer<T>> => {
  const { data, success, error } = schema.safeParse(value);
  if (success) {
    return Result.of(data);
  }

  Sentry.captureException(error);
  return Result.throw(error);
};

export const mapDict = <K extends PropertyKey, V, L extends PropertyKey, U>(
  obj: Record<K, V>,
  fn: (key: K, value: V) => [L, U]
): Record<L, U> =>
  Object.fromEntries(
    Object.entries(obj).map(([key, value]) => fn(key as K, value as V))
  ) as Record<L, U>;

export const cloak = (str: string, unmaskedChars = 4): string => {
  if (str.length <= unmaskedChars) {
    return "*".repeat(str.length);
  }
  const maskedPart = "*".repeat(str.length - unmaskedChars);
  const unmaskedPart = str.slice(-unmaskedChars);
  return maskedPart + unmaskedPart;
};

export const truncate = (value: unknown, maxLength: number): string => {
  let str: string;
  try {
    str = JSON.stringify(value) ?? String(value);
  } catch {
    str = String(value);
  }

  return str.length <= maxLength ? str : str.slice(0, maxLength) + "...";
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));
