//every pipeline stage returns one of these instead of throwing, so the packer can stop at the first failure
export type Outcome<T, E> =
    | { ok: true, value: T }
    | { ok: false, error: E };

export function ok<T>(value: T) : { ok: true, value: T }
{
    return { ok: true, value: value };
}

export function fail<E>(error: E) : { ok: false, error: E }
{
    return { ok: false, error: error };
}
