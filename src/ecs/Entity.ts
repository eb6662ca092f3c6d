import type { Component, ComponentId, ComponentRef, Storage, StorageEquality } from "./Types";

/** Read-only surface of an entity, handed out by World read iterators. */
export interface ReadonlyEntity<S extends Storage> {
    readonly size: number;
    get<T>(component: Component<S, T>): T | undefined;
    getById(id: ComponentId): S | undefined;
    has<T>(component: Component<S, T>): boolean;
    hasById(id: ComponentId): boolean;
    ids(): IterableIterator<ComponentId>;
    components(): IterableIterator<S>;
    equals(other: ReadonlyEntity<S>, eqStorage?: StorageEquality<S>): boolean;
}

/**
 * A collection of components, at most one per component id.
 */
export class Entity<S extends Storage> implements ReadonlyEntity<S>
{
    private readonly storages = new Map<ComponentId, S>();

    public static from<S extends Storage>(storages: Iterable<S>): Entity<S>
    {
        const entity = new Entity<S>();
        for (const storage of storages) entity.add(storage);
        return entity;
    }

    public get size(): number
    {
        return this.storages.size;
    }

    //#region ---------- Add / Remove ----------
    /**
     * Inserts a storage under its own id.
     * Returns the storage it replaced, if any.
     */
    public add(storage: S): S | undefined
    {
        const id = storage.id();
        const prev = this.storages.get(id);
        this.storages.set(id, storage);
        return prev;
    }

    public remove<T>(component: Component<S, T>): S | undefined
    {
        return this.removeById(component.id);
    }

    public removeById(id: ComponentId): S | undefined
    {
        const prev = this.storages.get(id);
        if (prev === undefined) return undefined;
        this.storages.delete(id);
        return prev;
    }
    //#endregion

    //#region ---------- Access ----------
    /**
     * Finds the storage by the component's id, then asks the component to view it.
     * Undefined when either step fails.
     */
    public get<T>(component: Component<S, T>): T | undefined
    {
        const storage = this.storages.get(component.id);
        return storage === undefined ? undefined : component.get(storage);
    }

    public getMut<T>(component: Component<S, T>): ComponentRef<T> | undefined
    {
        const storage = this.storages.get(component.id);
        return storage === undefined ? undefined : component.getMut(storage);
    }

    public getById(id: ComponentId): S | undefined
    {
        return this.storages.get(id);
    }

    /** Same lookup as getById, only reachable through writable handles. */
    public getMutById(id: ComponentId): S | undefined
    {
        return this.storages.get(id);
    }

    public has<T>(component: Component<S, T>): boolean
    {
        return this.hasById(component.id);
    }

    public hasById(id: ComponentId): boolean
    {
        return this.storages.has(id);
    }
    //#endregion

    //#region ---------- Iteration ----------
    public ids(): IterableIterator<ComponentId>
    {
        return this.storages.keys();
    }

    public components(): IterableIterator<S>
    {
        return this.storages.values();
    }

    public componentsMut(): IterableIterator<S>
    {
        return this.storages.values();
    }
    //#endregion

    /** Same component ids, with equal storages under each. */
    public equals(other: ReadonlyEntity<S>, eqStorage: StorageEquality<S> = (a, b) => a.equals(b)): boolean
    {
        if (this.storages.size !== other.size) return false;
        for (const [id, storage] of this.storages) {
            const theirs = other.getById(id);
            if (theirs === undefined || !eqStorage(storage, theirs)) return false;
        }
        return true;
    }

    public toString(): string
    {
        return `Entity[${Array.from(this.storages.values(), (s) => String(s)).join(", ")}]`;
    }
}

/** Builds an entity from its components, later ones replacing earlier ones with the same id. */
export function entity<S extends Storage>(...storages: S[]): Entity<S>
{
    return Entity.from(storages);
}
