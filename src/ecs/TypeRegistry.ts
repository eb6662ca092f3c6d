import type { ComponentCtor, TypeId } from "./Types";

const ctorToId = new WeakMap<ComponentCtor<unknown>, TypeId>();
let nextId: TypeId = 1;

/**
 * Returns a stable numeric TypeId for a component constructor (or token function).
 */
export function typeId<T>(ctor: ComponentCtor<T>): TypeId {
    const existing = ctorToId.get(ctor);
    if (existing != null) return existing;
    if (nextId >= Number.MAX_SAFE_INTEGER) {
        throw new Error("typeId() failed: component type id space exhausted");
    }
    const id = nextId++;
    ctorToId.set(ctor, id);
    return id;
}

export function formatCtor<T>(ctor: ComponentCtor<T>): string {
    return ctor.name.length > 0 ? ctor.name : `anonymous#${typeId(ctor)}`;
}

/** Best-effort printable form of any component value. */
export function formatValue(value: unknown): string {
    switch (typeof value) {
        case "string":
            return JSON.stringify(value);
        case "bigint":
            return `${value}n`;
        case "symbol":
        case "function":
            return value.toString();
        case "object": {
            if (value === null) return "null";
            let json: string | undefined;
            try {
                json = JSON.stringify(value);
            } catch {
                // cyclic or otherwise unserializable
                json = undefined;
            }
            // toJSON() may yield undefined
            return json ?? Object.prototype.toString.call(value);
        }
        default:
            return String(value);
    }
}

/**
 * Structural equality for component values: Object.is for primitives,
 * element-wise for arrays, own enumerable keys for objects sharing a prototype.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
    return deepEqual(a, b, new WeakMap<object, object>());
}

function deepEqual(a: unknown, b: unknown, seen: WeakMap<object, object>): boolean {
    if (Object.is(a, b)) return true;
    if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
    if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
    if (seen.get(a) === b) return true;
    seen.set(a, b);

    if (Array.isArray(a) && Array.isArray(b)) {
        if (a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!deepEqual(a[i], b[i], seen)) return false;
        }
        return true;
    }

    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    for (const key of keysA) {
        if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
        if (!deepEqual(Reflect.get(a, key), Reflect.get(b, key), seen)) return false;
    }
    return true;
}
