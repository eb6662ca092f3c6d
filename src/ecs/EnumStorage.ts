import { formatValue, valuesEqual } from "./TypeRegistry";
import type { Component, ComponentId, ComponentRef, Storage } from "./Types";

/** Declares one member type of a closed-set storage. */
export type VariantSpec<T> = Readonly<{
    kind: "variant";
    /** Type carrier only, never set. */
    witness?: (value: T) => T;
}>;

export function variant<T>(): VariantSpec<T> {
    return { kind: "variant" };
}

export type VariantSpecs = Readonly<Record<string, Readonly<{ kind: "variant" }>>>;

/** Member tag -> value type. */
export type VariantValues<M extends VariantSpecs> = {
    [K in keyof M]: M[K] extends VariantSpec<infer T> ? T : never;
};

export type VariantTag<V> = keyof V & string;

/**
 * Closed-set storage: a tagged union over the members declared in its kind.
 * The member index doubles as the component id.
 */
export class EnumStorage<V> implements Storage {
    private constructor(
        private readonly index: ComponentId,
        readonly tag: VariantTag<V>,
        public value: unknown
    ) {}

    /** Sole way to build a storage: id and tag both come from `variant`. */
    public static of<V, K extends VariantTag<V>>(variant: EnumVariant<V, K>, value: V[K]): EnumStorage<V> {
        return new EnumStorage<V>(variant.id, variant.tag, value);
    }

    public id(): ComponentId {
        return this.index;
    }

    public is<K extends VariantTag<V>>(tag: K): this is EnumStorage<V> & { readonly tag: K; value: V[K] } {
        return this.tag === tag;
    }

    public equals(other: Storage): boolean {
        return other instanceof EnumStorage && other.index === this.index && valuesEqual(this.value, other.value);
    }

    public toString(): string {
        return `${this.tag}(${formatValue(this.value)})`;
    }
}

/** Generated accessor for one member of a closed set. */
export class EnumVariant<V, K extends VariantTag<V>> implements Component<EnumStorage<V>, V[K]> {
    readonly id: ComponentId;

    /** The id is looked up in `kind`, never passed in. */
    constructor(private readonly kind: EnumStorageKind<V>, readonly tag: K) {
        const id = kind.idOf(tag);
        if (id === undefined) {
            throw new Error(`variant(${tag}) failed: not a member of this storage`);
        }
        this.id = id;
    }

    public of(value: V[K]): EnumStorage<V> {
        return EnumStorage.of<V, K>(this, value);
    }

    public get(storage: EnumStorage<V>): V[K] | undefined {
        return storage.is(this.tag) ? storage.value : undefined;
    }

    public getMut(storage: EnumStorage<V>): ComponentRef<V[K]> | undefined {
        return storage.is(this.tag) ? storage : undefined;
    }
}

export class EnumStorageKind<V> {
    /** @param order member tags in declaration order */
    constructor(private readonly order: ReadonlyArray<string>) {}

    /** Member tags in id order. */
    public get tags(): ReadonlyArray<string> {
        return this.order;
    }

    public get size(): number {
        return this.order.length;
    }

    public idOf(tag: string): ComponentId | undefined {
        const id = this.order.indexOf(tag);
        return id >= 0 ? id : undefined;
    }

    public variant<K extends VariantTag<V>>(tag: K): EnumVariant<V, K> {
        return new EnumVariant<V, K>(this, tag);
    }

    public of<K extends VariantTag<V>>(tag: K, value: V[K]): EnumStorage<V> {
        return this.variant(tag).of(value);
    }
}

/**
 * Builds a closed-set storage kind from a list of member declarations.
 *
 * ```ts
 * const Components = enumStorage({ A: variant<number>(), B: variant<string>() });
 * const A = Components.variant("A"); // id 0
 * const B = Components.variant("B"); // id 1
 * entity.add(A.of(5));
 * ```
 */
export function enumStorage<M extends VariantSpecs>(members: M): EnumStorageKind<VariantValues<M>> {
    return new EnumStorageKind<VariantValues<M>>(Object.keys(members));
}
