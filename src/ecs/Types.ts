import type { Entity, ReadonlyEntity } from "./Entity";

/**
 * Handle of an entity inside a World.
 * 0 is the null id and is never issued.
 */
export type EntityId = number;

export type PredicateId = number;

/**
 * Identifier of a component type within one storage kind.
 * (Dense member index for enum storages, process-wide TypeId for DynStorage.)
 */
export type ComponentId = number;

/**
 * Internal numeric id for a component "type".
 * (We keep it numeric so storages can key maps on it cheaply.)
 */
export type TypeId = number;

/** A class, or a token function standing in for a non-class type. */
export type ComponentCtor<T> =
    | (new (...args: never[]) => T)
    | ((...args: never[]) => T);

/** Container holding exactly one component value. */
export interface Storage {
    id(): ComponentId;
    /** Same component id and an equal value. */
    equals(other: Storage): boolean;
}

/** Overrides Storage.equals when comparing entities or worlds. */
export type StorageEquality<S extends Storage> = (a: S, b: S) => boolean;

/** Writable view into a storage's value. */
export interface ComponentRef<T> {
    value: T;
}

/**
 * Per-type accessor for one storage kind.
 * Viewing a storage of a different type yields undefined, never a fault.
 */
export interface Component<S extends Storage, T> {
    readonly id: ComponentId;
    of(value: T): S;
    get(storage: S): T | undefined;
    getMut(storage: S): ComponentRef<T> | undefined;
}

/**
 * Must be pure: results are baked into the predicate's candidate list
 * and never re-tested.
 */
export type EntityPredicate<S extends Storage> = (entity: ReadonlyEntity<S>) => boolean;

export type WorldOptions = Readonly<{
    /** Log predicate/command bookkeeping through console.debug. Defaults to false. */
    debugLogging?: boolean;

    /** First id handed out by add(). Defaults to 1. */
    firstEntityId?: EntityId;
}>;

export type WorldStats = Readonly<{
    entities: number;
    predicates: number;
    /** Sum of all candidate list lengths, tombstones included. */
    candidateSlots: number;
    tombstones: number;
    /** Undefined once the id space is used up. */
    nextEntityId: EntityId | undefined;
    pendingCommands: boolean;
}>;

export interface CommandsApi<S extends Storage> {
    add(entity: Entity<S>, init?: (id: EntityId) => void): void;
    remove(id: EntityId): void;
}

export type SnapshotCodec<T, D = unknown> = Readonly<{
    key: string;
    serialize(value: T): D;
    /** Receives untrusted data; validate before building the value. */
    deserialize(data: unknown): T;
}>;

export type ComponentSnapshot = Readonly<{
    type: string;
    data: unknown;
}>;

export type EntitySnapshot = ReadonlyArray<ComponentSnapshot>;

export type WorldSnapshot = Readonly<{
    format: "predicate-ecs/world-snapshot@1";
    entities: ReadonlyArray<EntitySnapshot>;
}>;
