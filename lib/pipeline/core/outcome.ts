/**
 * Result of a step that may fall back instead of failing.
 *
 * - `ok`: the step produced its value.
 * - `recovered`: the step failed but a fallback value was substituted.
 * - `fatal`: no usable value; the caller decides whether to throw.
 */
export type Outcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "recovered"; value: T; reason: string }
  | { kind: "fatal"; reason: string };

export function ok<T>(value: T): Outcome<T> {
  return { kind: "ok", value };
}

export function recovered<T>(value: T, reason: string): Outcome<T> {
  return { kind: "recovered", value, reason };
}

export function fatal<T>(reason: string): Outcome<T> {
  return { kind: "fatal", reason };
}
