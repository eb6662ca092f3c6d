import type { EntityId } from "./Types";

/** Id of an entity that does not exist. Never issued. */
export const NULL_ENTITY_ID: EntityId = 0;

export function isNullEntityId(id: EntityId): boolean
{
    return id === NULL_ENTITY_ID;
}

/**
 * Successor of `id`. Throws instead of leaving the safe integer range:
 * wrapping or losing precision would hand out an id twice.
 */
export function nextEntityId(id: EntityId): EntityId
{
    if (id >= Number.MAX_SAFE_INTEGER) {
        throw new Error(`Entity id space exhausted after ${id}`);
    }
    return id + 1;
}

/** Monotonic entity id source. Ids are never reused, even after removal. */
export class EntityIdAllocator
{
    private _next: EntityId;
    private _exhausted = false;

    constructor(start: EntityId = 1)
    {
        if (!Number.isSafeInteger(start) || start <= NULL_ENTITY_ID) {
            throw new Error(`Invalid first entity id: ${start}. Expected a positive safe integer.`);
        }
        this._next = start;
    }

    /** Id the next allocate() will return; undefined once the id space is used up. */
    public peek(): EntityId | undefined
    {
        return this._exhausted ? undefined : this._next;
    }

    public get exhausted(): boolean
    {
        return this._exhausted;
    }

    public allocate(): EntityId
    {
        if (this._exhausted) {
            throw new Error(`Entity id space exhausted after ${this._next}`);
        }
        const id = this._next;
        if (id >= Number.MAX_SAFE_INTEGER) {
            this._exhausted = true;
        } else {
            this._next = nextEntityId(id);
        }
        return id;
    }
}
