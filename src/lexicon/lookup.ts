/**
 * Result of a table or dictionary lookup. A miss is an ordinary,
 * frequent outcome, so it is a value rather than an exception.
 */
export type Lookup<T> = { found: true; value: T } | { found: false };

export function found<T>(value: T): Lookup<T> {
    return { found: true, value };
}

export const notFound: Lookup<never> = { found: false };

/** Wrap a possibly-absent value. */
export function fromNullable<T>(value: T | undefined): Lookup<T> {
    return value === undefined ? notFound : found(value);
}

export function mapLookup<T, U>(lookup: Lookup<T>, fn: (value: T) => U): Lookup<U> {
    return lookup.found ? found(fn(lookup.value)) : notFound;
}

/** Try each attempt in order and return the first hit. Later attempts are not evaluated. */
export function firstFound<T>(...attempts: Array<() => Lookup<T>>): Lookup<T> {
    for (const attempt of attempts) {
        const result = attempt();
        if (result.found) return result;
    }
    return notFound;
}
