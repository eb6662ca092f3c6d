import { Entity, type ReadonlyEntity } from "./Entity";
import type {
    Component,
    ComponentId,
    ComponentSnapshot,
    EntityId,
    EntitySnapshot,
    SnapshotCodec,
    Storage,
    WorldSnapshot
} from "./Types";

export const WORLD_SNAPSHOT_FORMAT: WorldSnapshot["format"] = "predicate-ecs/world-snapshot@1";

type ComponentSnapshotRegistration<S extends Storage> = Readonly<{
    key: string;
    serialize: (storage: S) => ComponentSnapshot | undefined;
    deserialize: (data: unknown) => S;
}>;

/** The part of a World a snapshot reads. */
export type WorldSnapshotSource<S extends Storage> = Readonly<{
    entries(): Iterable<[EntityId, ReadonlyEntity<S>]>;
}>;

/**
 * Serialization adapter for one storage kind.
 *
 * Only registered component types are written; everything else is treated as
 * runtime-only state. Predicate indices are never part of a snapshot.
 */
export class SnapshotStore<S extends Storage>
{
    private readonly byId = new Map<ComponentId, ComponentSnapshotRegistration<S>>();
    private readonly idByKey = new Map<string, ComponentId>();

    public register<T>(component: Component<S, T>, codec: SnapshotCodec<T>): this
    {
        const key = this._normalizeKey(codec.key);
        const existing = this.idByKey.get(key);
        if (existing !== undefined && existing !== component.id) {
            throw new Error(`register(${key}) failed: key already used by component id ${existing}`);
        }

        const prev = this.byId.get(component.id);
        if (prev && prev.key !== key) this.idByKey.delete(prev.key);

        this.byId.set(component.id, {
            key,
            serialize: (storage: S) => {
                const value = component.get(storage);
                return value === undefined ? undefined : { type: key, data: codec.serialize(value) };
            },
            deserialize: (data: unknown) => component.of(codec.deserialize(data))
        });
        this.idByKey.set(key, component.id);
        return this;
    }

    public unregister<T>(component: Component<S, T>): boolean
    {
        const prev = this.byId.get(component.id);
        if (!prev) return false;
        this.byId.delete(component.id);
        this.idByKey.delete(prev.key);
        return true;
    }

    public isRegistered<T>(component: Component<S, T>): boolean
    {
        return this.byId.has(component.id);
    }

    /** Registered components of `entity`, ordered by snapshot key. */
    public snapshotEntity(entity: ReadonlyEntity<S>): EntitySnapshot
    {
        const out: ComponentSnapshot[] = [];
        for (const storage of entity.components()) {
            const reg = this.byId.get(storage.id());
            if (!reg) continue;
            const snap = reg.serialize(storage);
            if (snap) out.push(snap);
        }
        out.sort((a, b) => a.type.localeCompare(b.type));
        return out;
    }

    public restoreEntity(snapshot: EntitySnapshot): Entity<S>
    {
        const entity = new Entity<S>();
        const seen = new Set<string>();
        for (const component of snapshot) {
            if (seen.has(component.type)) {
                throw new Error(`Duplicate component type "${component.type}" in entity snapshot`);
            }
            seen.add(component.type);

            const id = this.idByKey.get(component.type);
            const reg = id === undefined ? undefined : this.byId.get(id);
            if (!reg) {
                throw new Error(`Missing component snapshot codec for "${component.type}". Register it before restore.`);
            }
            entity.add(reg.deserialize(component.data));
        }
        return entity;
    }

    /** All entities in ascending id order. */
    public snapshotWorld(world: WorldSnapshotSource<S>): WorldSnapshot
    {
        const rows = Array.from(world.entries()).sort((a, b) => a[0] - b[0]);
        return {
            format: WORLD_SNAPSHOT_FORMAT,
            entities: rows.map(([, entity]) => this.snapshotEntity(entity))
        };
    }

    /**
     * Rebuilds the entities of a world snapshot, in order.
     * Feed them to World.fromEntities / World.add: ids are issued afresh.
     */
    public restoreEntities(snapshot: WorldSnapshot): Entity<S>[]
    {
        if (snapshot.format !== WORLD_SNAPSHOT_FORMAT) {
            throw new Error(
                `Unsupported world snapshot format "${snapshot.format}". ` +
                `Expected "${WORLD_SNAPSHOT_FORMAT}".`
            );
        }
        return snapshot.entities.map((e) => this.restoreEntity(e));
    }

    private _normalizeKey(key: string): string
    {
        const normalized = key.trim();
        if (normalized.length === 0) {
            throw new Error("register() failed: codec.key must be a non-empty string");
        }
        return normalized;
    }
}
