export type Ok<V> = { ok: true, value: V };
export type Err<E> = { ok: false, error: E };
export type Result<V, E> = Ok<V> | Err<E>;

export const ok = <V>(value: V): Ok<V> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export type AllocationFailure = {
  kind: 'allocation',
  requested: number,
  cause: unknown
};

export type RangeViolation = {
  kind: 'range',
  index: number,
  count: number
};

export type IoFailure = {
  kind: 'io',
  filename: string,
  cause: unknown
};

export type SetFailure = AllocationFailure | RangeViolation;
export type Failure = SetFailure | IoFailure;

const reasonOf = (cause: unknown) => cause instanceof Error ? cause.message : String(cause);

export const describeFailure = (failure: Failure): string => {
  switch (failure.kind) {
    case 'allocation':
      return `Could not allocate ${failure.requested} slots: ${reasonOf(failure.cause)}`;
    case 'range':
      return `Index ${failure.index} out of range for ${failure.count} elements`;
    case 'io':
      return `Could not read ${failure.filename}: ${reasonOf(failure.cause)}`;
  }
}
