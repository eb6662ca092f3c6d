import { formatCtor, formatValue, typeId, valuesEqual } from "./TypeRegistry";
import type { Component, ComponentCtor, ComponentRef, Storage, TypeId } from "./Types";

/**
 * Open-set storage: boxes a value of any component type, keyed by the
 * process-wide TypeId of the ctor it was boxed as.
 */
export class DynStorage implements Storage
{
    private readonly tid: TypeId;

    private constructor(private readonly ctor: ComponentCtor<unknown>, public value: unknown)
    {
        this.tid = typeId(ctor);
    }

    public static new<T>(ctor: ComponentCtor<T>, value: T): DynStorage
    {
        return new DynStorage(ctor, value);
    }

    public id(): TypeId
    {
        return this.tid;
    }

    /**
     * Exact type test: true only for the ctor the value was boxed as.
     * Subclasses and structurally equal types do not match.
     */
    public holds<T>(ctor: ComponentCtor<T>): this is DynStorage & ComponentRef<T>
    {
        return this.tid === typeId(ctor) && this.ctor === ctor;
    }

    public view<T>(ctor: ComponentCtor<T>): T | undefined
    {
        return this.holds(ctor) ? this.value : undefined;
    }

    public viewMut<T>(ctor: ComponentCtor<T>): ComponentRef<T> | undefined
    {
        return this.holds(ctor) ? this : undefined;
    }

    /** Raw (TypeId, value) pair. */
    public unwrap(): [TypeId, unknown]
    {
        return [this.tid, this.value];
    }

    public equals(other: Storage): boolean
    {
        return other instanceof DynStorage && other.tid === this.tid && valuesEqual(this.value, other.value);
    }

    public toString(): string
    {
        return `DynStorage(${formatCtor(this.ctor)}: ${formatValue(this.value)})`;
    }
}

/** Accessor used by Entity lookups; cheap to create, holds no state besides the ctor. */
export function dyn<T>(ctor: ComponentCtor<T>): Component<DynStorage, T>
{
    return {
        id: typeId(ctor),
        of: (value: T) => DynStorage.new(ctor, value),
        get: (storage: DynStorage) => storage.view(ctor),
        getMut: (storage: DynStorage) => storage.viewMut(ctor)
    };
}
