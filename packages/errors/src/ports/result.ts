export type SuccessfulResult<T> = Readonly<{
  success: true
  value: T
}>

export type FailedResult<E> = Readonly<{
  success: false
  error: E
}>

export type Result<T, E> = SuccessfulResult<T> | FailedResult<E>
