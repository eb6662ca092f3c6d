import type { Entity } from "./Entity";
import type { CommandsApi, EntityId, Storage } from "./Types";

export type Command<S extends Storage> =
    | { k: "add"; entity: Entity<S>; init?: (id: EntityId) => void }
    | { k: "remove"; id: EntityId };

/**
 * Structural changes recorded while the world is being iterated,
 * applied in order by World.flush().
 */
export class Commands<S extends Storage> implements CommandsApi<S>
{
    private q: Command<S>[] = [];

    public add(entity: Entity<S>, init?: (id: EntityId) => void): void
    {
        this.q.push({ k: "add", entity, init });
    }

    public addBundle(entities: Iterable<Entity<S>>): void
    {
        for (const entity of entities) this.add(entity);
    }

    public remove(id: EntityId): void
    {
        this.q.push({ k: "remove", id });
    }

    public removeBundle(ids: Iterable<EntityId>): void
    {
        for (const id of ids) this.remove(id);
    }

    public hasPending(): boolean
    {
        return this.q.length > 0;
    }

    public drain(): Command<S>[]
    {
        const out = this.q;
        this.q = [];
        return out;
    }
}
