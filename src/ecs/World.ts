import { type Command, Commands } from "./Commands";
import type { Entity, ReadonlyEntity } from "./Entity";
import { EntityIdAllocator } from "./EntityIdAllocator";
import { PredicateIndex } from "./PredicateIndex";
import { PredIter, type PredIterRuntime } from "./PredIter";
import type { SnapshotStore } from "./SnapshotStore";
import type {
    EntityId,
    EntityPredicate,
    PredicateId,
    Storage,
    StorageEquality,
    WorldOptions,
    WorldSnapshot,
    WorldStats
} from "./Types";

/** Read iterator over one predicate; PredIter typed down to read-only entities. */
export type ReadonlyPredIter<S extends Storage> = IterableIterator<ReadonlyEntity<S>> & {
    readonly predId: PredicateId;
};

/**
 * Owns every entity, keyed by a never-reused id (0 means "no entity"),
 * plus the registered predicate indices.
 *
 * add() pays for keeping every predicate current; remove() only touches the
 * table and leaves stale ids behind in the predicate lists, to be retired by
 * iterators and compacted by later adds.
 */
export class World<S extends Storage>
{
    private readonly entities = new Map<EntityId, Entity<S>>();
    private readonly owned = new WeakSet<Entity<S>>();
    private readonly ids: EntityIdAllocator;

    private readonly predicates = new Map<PredicateId, PredicateIndex<S>>();
    private nextPredId: PredicateId = 1;

    private readonly commands = new Commands<S>();

    // Bumped by every structural change; live iterators compare against it.
    private _version = 0;
    private _debugLogging: boolean;

    private readonly runtime: PredIterRuntime<S> = {
        version: () => this._version,
        predicate: (id) => this.predicates.get(id),
        lookup: (id) => this.entities.get(id)
    };

    constructor(options: WorldOptions = {})
    {
        this.ids = new EntityIdAllocator(options.firstEntityId ?? 1);
        this._debugLogging = options.debugLogging ?? false;
    }

    public static fromEntities<S extends Storage>(entities: Iterable<Entity<S>>, options: WorldOptions = {}): World<S>
    {
        const world = new World<S>(options);
        for (const entity of entities) world.add(entity);
        return world;
    }

    /**
     * Rebuilds a world from a snapshot through the regular add() path.
     * Ids are re-issued and predicates must be registered again.
     */
    public static restore<S extends Storage>(snapshot: WorldSnapshot, store: SnapshotStore<S>, options: WorldOptions = {}): World<S>
    {
        return World.fromEntities(store.restoreEntities(snapshot), options);
    }

    public get size(): number
    {
        return this.entities.size;
    }

    public get predicateCount(): number
    {
        return this.predicates.size;
    }

    public setDebugLogging(enabled: boolean): void
    {
        this._debugLogging = enabled;
    }

    //#region ---------- Entity table ----------
    /**
     * Stamps the next id on `entity`, updates every predicate index and stores it.
     * Cost grows with the number of registered predicates.
     *
     * Every predicate runs before anything is written, so a throwing predicate
     * leaves the world untouched.
     */
    public add(entity: Entity<S>): EntityId
    {
        if (this.owned.has(entity)) {
            throw new Error("Cannot add entity: already owned by this world");
        }

        const verdicts = Array.from(
            this.predicates.values(),
            (index): [PredicateIndex<S>, boolean] => [index, index.matches(entity)]
        );

        const id = this.ids.allocate();
        this._version++;

        for (const [index, matched] of verdicts) {
            const dropped = index.accept(id, matched);
            if (dropped > 0) this._debug(`predicate #${index.id}: compacted ${dropped} tombstone(s)`);
        }

        this.entities.set(id, entity);
        this.owned.add(entity);
        return id;
    }

    /** Removes from the table only; predicate lists keep the stale id for now. */
    public remove(id: EntityId): Entity<S> | undefined
    {
        const entity = this.entities.get(id);
        if (entity === undefined) return undefined;
        this._version++;
        this.entities.delete(id);
        this.owned.delete(entity);
        return entity;
    }

    public get(id: EntityId): ReadonlyEntity<S> | undefined
    {
        return this.entities.get(id);
    }

    public getMut(id: EntityId): Entity<S> | undefined
    {
        return this.entities.get(id);
    }

    public has(id: EntityId): boolean
    {
        return this.entities.has(id);
    }

    /**
     * Direct access for ids the caller knows are alive.
     * Throws on an unknown id; use get()/getMut() when absence is expected.
     */
    public at(id: EntityId): Entity<S>
    {
        const entity = this.entities.get(id);
        if (entity === undefined) throw new Error(`Unknown entity id ${id}`);
        return entity;
    }

    /** Every entity, in id order. */
    public iterAll(): IterableIterator<ReadonlyEntity<S>>
    {
        return this._iterTable((_id, entity) => entity, "iterAll");
    }

    public iterAllMut(): IterableIterator<Entity<S>>
    {
        return this._iterTable((_id, entity) => entity, "iterAllMut");
    }

    public entries(): IterableIterator<[EntityId, ReadonlyEntity<S>]>
    {
        return this._iterTable((id, entity): [EntityId, ReadonlyEntity<S>] => [id, entity], "entries");
    }
    //#endregion

    //#region ---------- Predicates ----------
    /**
     * Registers a predicate and seeds its index with one scan of the table.
     * The predicate must be pure: stored results are never re-tested.
     */
    public addPred(pred: EntityPredicate<S>): PredicateId
    {
        if (this.nextPredId >= Number.MAX_SAFE_INTEGER) {
            throw new Error("addPred() failed: predicate id space exhausted");
        }
        const id = this.nextPredId++;
        this._version++;

        const index = new PredicateIndex<S>(id, pred);
        index.seed(this.entities.entries());
        this.predicates.set(id, index);

        this._debug(`predicate #${id} registered with ${index.length} candidate(s)`);
        return id;
    }

    /** Drops a predicate and its cached list. Its id is not reused. */
    public removePred(id: PredicateId): boolean
    {
        if (!this.predicates.delete(id)) return false;
        this._version++;
        this._debug(`predicate #${id} removed`);
        return true;
    }

    public hasPred(id: PredicateId): boolean
    {
        return this.predicates.has(id);
    }

    /** Undefined for an id that was never registered (or was removed). */
    public iterPred(id: PredicateId): ReadonlyPredIter<S> | undefined
    {
        return this.iterPredMut(id);
    }

    public iterPredMut(id: PredicateId): PredIter<S> | undefined
    {
        if (!this.predicates.has(id)) return undefined;
        return new PredIter<S>(this.runtime, id, this._version);
    }
    //#endregion

    //#region ---------- Deferred changes ----------
    /** Queue structural changes to apply after iterating. */
    public cmd(): Commands<S>
    {
        return this.commands;
    }

    public flush(): void
    {
        const ops = this.commands.drain();
        if (ops.length === 0) return;
        this._debug(`flushing ${ops.length} command(s)`);
        for (const op of ops) this._apply(op);
    }
    //#endregion

    public stats(): WorldStats
    {
        let candidateSlots = 0;
        let tombstones = 0;
        for (const index of this.predicates.values()) {
            candidateSlots += index.length;
            tombstones += index.tombstones;
        }
        return {
            entities: this.entities.size,
            predicates: this.predicates.size,
            candidateSlots,
            tombstones,
            nextEntityId: this.ids.peek(),
            pendingCommands: this.commands.hasPending()
        };
    }

    /**
     * Same ids holding equal entities. Predicates and pending commands are
     * not compared.
     */
    public equals(other: World<S>, eqStorage?: StorageEquality<S>): boolean
    {
        if (this.entities.size !== other.entities.size) return false;
        for (const [id, entity] of this.entities) {
            const theirs = other.entities.get(id);
            if (theirs === undefined || !entity.equals(theirs, eqStorage)) return false;
        }
        return true;
    }

    public snapshot(store: SnapshotStore<S>): WorldSnapshot
    {
        return store.snapshotWorld(this);
    }

    //#region ---------- Internals ----------
    private *_iterTable<R>(pick: (id: EntityId, entity: Entity<S>) => R, op: string): IterableIterator<R>
    {
        const version = this._version;
        for (const [id, entity] of this.entities) {
            if (this._version !== version) {
                throw new Error(`World was structurally modified during ${op}(). Queue changes with world.cmd() and flush() after iterating.`);
            }
            yield pick(id, entity);
        }
    }

    private _apply(op: Command<S>): void
    {
        switch (op.k) {
            case "add": {
                const id = this.add(op.entity);
                op.init?.(id);
                return;
            }
            case "remove":
                this.remove(op.id);
                return;
        }
    }

    private _debug(message: string): void
    {
        if (!this._debugLogging) return;
        // tslint:disable-next-line:no-console
        console.debug(`[World] ${message}`);
    }
    //#endregion
}
