/**
 * Recursively freeze plain objects and arrays
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        const children: unknown[] = Object.values(value);
        children.forEach(child => deepFreeze(child));
    }
    return value;
}
