/** Outcome of a validation step that never touches storage */
export type ValidationResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'error'; readonly message: string };

export function ok<T>(data: T): ValidationResult<T> {
  return { type: 'success', data };
}

export function fail<T>(message: string): ValidationResult<T> {
  return { type: 'error', message };
}

export function isSuccess<T>(r: ValidationResult<T>): r is { readonly type: 'success'; readonly data: T } {
  return r.type === 'success';
}
