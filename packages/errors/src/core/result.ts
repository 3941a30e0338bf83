import type { FailedResult, SuccessfulResult } from "../ports/result"

export function ok<T>(value: T): SuccessfulResult<T> {
  return { success: true, value }
}

export function err<E>(error: E): FailedResult<E> {
  return { success: false, error }
}
