// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

type ResultState<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/**
 * Outcome of an operation that may fail without throwing. `value` and `error` throw when read
 * on the wrong variant, so callers check `isOk` first.
 */
export class Result<T, E = string> {
    readonly #state: ResultState<T, E>;

    private constructor(state: ResultState<T, E>) {
        this.#state = state;
    }

    get isOk() {
        return this.#state.ok;
    }

    get value(): T {
        if (!this.#state.ok) {
            throw new Error(`Result is an error: ${String(this.#state.error)}`);
        }
        return this.#state.value;
    }

    get error(): E {
        if (this.#state.ok) {
            throw new Error("Result is ok and carries no error");
        }
        return this.#state.error;
    }

    unchecked(): T | undefined {
        return this.#state.ok ? this.#state.value : undefined;
    }

    map<U>(fn: (value: T) => U): Result<U, E> {
        return this.#state.ok ? Result.ok(fn(this.#state.value)) : Result.err(this.#state.error);
    }

    static ok<T, E = string>(value: T): Result<T, E> {
        return new Result<T, E>({ ok: true, value });
    }

    static err<T, E = string>(error: E): Result<T, E> {
        return new Result<T, E>({ ok: false, error });
    }
}
