export * from "./ecs/Types";
export { typeId, formatCtor, formatValue, valuesEqual } from "./ecs/TypeRegistry";
export { DynStorage, dyn } from "./ecs/DynStorage";
export {
    EnumStorage,
    EnumStorageKind,
    EnumVariant,
    enumStorage,
    variant,
    type VariantSpec,
    type VariantSpecs,
    type VariantTag,
    type VariantValues
} from "./ecs/EnumStorage";
export { Entity, entity, type ReadonlyEntity } from "./ecs/Entity";
export { EntityIdAllocator, NULL_ENTITY_ID, isNullEntityId, nextEntityId } from "./ecs/EntityIdAllocator";
export { PredicateIndex } from "./ecs/PredicateIndex";
export { PredIter, type PredIterRuntime } from "./ecs/PredIter";
export { Commands, type Command } from "./ecs/Commands";
export { SnapshotStore, WORLD_SNAPSHOT_FORMAT, type WorldSnapshotSource } from "./ecs/SnapshotStore";
export { World, type ReadonlyPredIter } from "./ecs/World";
