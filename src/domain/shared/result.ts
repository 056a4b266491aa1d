/**
 * Result type for explicit error handling without exceptions.
 *
 * Domain operations return Result<E, A> instead of throwing. Services at the
 * edge turn an Err into an AppError.
 *
 * Convention: Left is Error, Right is Success.
 */

export type Result<E, A> =
  | { readonly _tag: 'Err'; readonly error: E }
  | { readonly _tag: 'Ok'; readonly value: A };

// Constructors
export const ok = <A>(value: A): Result<never, A> => ({
  _tag: 'Ok',
  value,
});

export const err = <E>(error: E): Result<E, never> => ({
  _tag: 'Err',
  error,
});

// Type guards
export const isOk = <E, A>(result: Result<E, A>): result is { readonly _tag: 'Ok'; readonly value: A } =>
  result._tag === 'Ok';

export const isErr = <E, A>(result: Result<E, A>): result is { readonly _tag: 'Err'; readonly error: E } =>
  result._tag === 'Err';

// Extractors (throw on the wrong variant; meant for tests and asserted paths)
export const unwrap = <E, A>(result: Result<E, A>): A => {
  if (isOk(result)) return result.value;
  throw new Error(`Called unwrap on Err: ${JSON.stringify(result.error)}`);
};

export const unwrapErr = <E, A>(result: Result<E, A>): E => {
  if (isErr(result)) return result.error;
  throw new Error(`Called unwrapErr on Ok: ${JSON.stringify(result.value)}`);
};
