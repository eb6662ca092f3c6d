import type { Entity } from "./Entity";
import { isNullEntityId } from "./EntityIdAllocator";
import type { PredicateIndex } from "./PredicateIndex";
import type { EntityId, PredicateId, Storage } from "./Types";

/** What a predicate iterator needs from its World. */
export type PredIterRuntime<S extends Storage> = Readonly<{
    version(): number;
    predicate(id: PredicateId): PredicateIndex<S> | undefined;
    lookup(id: EntityId): Entity<S> | undefined;
}>;

/**
 * Cursor over one predicate's candidate list.
 *
 * Keeps no entity references between calls: every next() re-reads the list
 * and looks the id up in the live table. Ids whose entity is gone are turned
 * into tombstones as they are passed over.
 */
export class PredIter<S extends Storage> implements IterableIterator<Entity<S>>
{
    private cursor = 0;
    private finished = false;

    constructor(
        private readonly runtime: PredIterRuntime<S>,
        readonly predId: PredicateId,
        private readonly version: number
    ) {}

    public next(): IteratorResult<Entity<S>>
    {
        if (this.finished) return { value: undefined, done: true };

        if (this.runtime.version() !== this.version) {
            throw new Error(
                `World was structurally modified while iterating predicate #${this.predId}. ` +
                `Queue changes with world.cmd() and flush() after iterating.`
            );
        }

        const index = this.runtime.predicate(this.predId);
        if (index) {
            const ids = index.ids;
            while (this.cursor < ids.length) {
                const slot = this.cursor++;
                const id = ids[slot];
                if (id === undefined || isNullEntityId(id)) continue;

                const entity = this.runtime.lookup(id);
                if (entity) return { value: entity, done: false };

                index.retire(slot);
            }
        }

        this.finished = true;
        return { value: undefined, done: true };
    }

    public [Symbol.iterator](): this
    {
        return this;
    }
}
