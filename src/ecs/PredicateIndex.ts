import type { Entity } from "./Entity";
import { NULL_ENTITY_ID, isNullEntityId } from "./EntityIdAllocator";
import type { EntityId, EntityPredicate, PredicateId, Storage } from "./Types";

/**
 * A registered predicate plus the ids believed to satisfy it.
 *
 * The list is only eventually accurate: removing an entity does not touch it.
 * Iterators overwrite the stale id with NULL_ENTITY_ID when they find the entity
 * gone, and the next accept() compacts those slots away.
 */
export class PredicateIndex<S extends Storage>
{
    /** Candidate ids in insertion order; NULL_ENTITY_ID marks a tombstone. */
    readonly ids: EntityId[] = [];

    constructor(readonly id: PredicateId, private readonly pred: EntityPredicate<S>) {}

    public get length(): number
    {
        return this.ids.length;
    }

    public get tombstones(): number
    {
        let n = 0;
        for (const id of this.ids) if (isNullEntityId(id)) n++;
        return n;
    }

    /** Full scan at registration time. */
    public seed(entries: Iterable<[EntityId, Entity<S>]>): void
    {
        for (const [id, entity] of entries) {
            if (this.pred(entity)) this.ids.push(id);
        }
    }

    public matches(entity: Entity<S>): boolean
    {
        return this.pred(entity);
    }

    /**
     * Insertion-time maintenance for a freshly added entity whose predicate
     * result is already known. Returns how many tombstones were compacted away.
     */
    public accept(id: EntityId, matched: boolean): number
    {
        const dropped = this.compact();
        if (matched) this.ids.push(id);
        return dropped;
    }

    /** Marks the slot at `index` as a tombstone. */
    public retire(index: number): void
    {
        if (index >= 0 && index < this.ids.length) this.ids[index] = NULL_ENTITY_ID;
    }

    private compact(): number
    {
        const ids = this.ids;
        let w = 0;
        for (let r = 0; r < ids.length; r++) {
            const id = ids[r];
            if (id === undefined || isNullEntityId(id)) continue;
            ids[w++] = id;
        }
        const dropped = ids.length - w;
        ids.length = w;
        return dropped;
    }
}
