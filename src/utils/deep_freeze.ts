export type DeepReadonly<T> = T extends RegExp
    ? T
    : T extends (infer U)[]
        ? readonly DeepReadonly<U>[]
        : T extends object
            ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
            : T;

// RegExp instances are left unfrozen: String.prototype.replace writes lastIndex on global patterns.
export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
    if (value === null || typeof value !== 'object' || value instanceof RegExp || Object.isFrozen(value)) {
        return value;
    }
    Object.freeze(value);
    for (const child of Object.values(value)) {
        deepFreeze(child);
    }
    return value;
}
