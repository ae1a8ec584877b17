export interface OkResult<T> {
    readonly ok: true;
    readonly value: T;
}

export interface ErrResult<E> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Outcome of a step that can fail in an expected way. Expected failures travel
 * as values so that loops over several archives never need try/catch to move on.
 */
export type Result<T, E> = OkResult<T> | ErrResult<E>;

export function ok<T>(value: T): OkResult<T> {
    return { ok: true, value };
}

export function err<E>(error: E): ErrResult<E> {
    return { ok: false, error };
}

export function mapError<T, E, F>(result: Result<T, E>, mapper: (error: E) => F): Result<T, F> {
    return result.ok ? result : err(mapper(result.error));
}

/**
 * Runs `action` and converts a rejection into an error value. Rejections that
 * `classify` does not recognise are rethrown unchanged.
 */
export async function fromPromise<T, E>(
    action: () => Promise<T>,
    classify: (error: unknown) => E | undefined,
): Promise<Result<T, E>> {
    try {
        return ok(await action());
    } catch (error) {
        const classified = classify(error);

        if (classified === undefined) {
            throw error;
        }

        return err(classified);
    }
}

export function partition<T, E>(results: readonly Result<T, E>[]): { values: T[]; errors: E[] } {
    const values: T[] = [];
    const errors: E[] = [];

    for (const result of results) {
        if (result.ok) {
            values.push(result.value);
        } else {
            errors.push(result.error);
        }
    }

    return { values, errors };
}
