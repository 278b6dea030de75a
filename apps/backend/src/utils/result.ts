/**
 * Result pattern for operations whose failure is an expected outcome the
 * caller must look at rather than an exception.
 */

export type Success<T> = {
  success: true;
  data: T;
};

export type Failure<E> = {
  success: false;
  error: E;
};

export type Result<T, E> = Success<T> | Failure<E>;

export const createSuccess = <T>(data: T): Success<T> => {
  return { success: true, data };
};

export const createError = <E>(error: E): Failure<E> => {
  return { success: false, error };
};
