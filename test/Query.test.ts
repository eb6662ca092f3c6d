import { World, entity, type ReadonlyEntity } from "../src";
import { A, B, C, type TestStorage } from "./Mocks/Components.mock";

const hasA = (e: ReadonlyEntity<TestStorage>) => e.has(A);
const hasAB = (e: ReadonlyEntity<TestStorage>) => e.has(A) && e.has(B);

function valuesOf(iter: Iterable<ReadonlyEntity<TestStorage>> | undefined): Array<number | undefined>
{
    return iter ? Array.from(iter, (e) => e.get(A)) : [];
}

describe("Predicate queries", () => {
    let world: World<TestStorage>;

    beforeEach(() => {
        world = new World<TestStorage>();
    });

    test("yields only entities matching a predicate registered on an empty world", () => {
        const pred = world.addPred(hasAB);
        world.add(entity(A.of(1), B.of("x")));
        world.add(entity(A.of(2)));

        const rows = Array.from(world.iterPred(pred) ?? []);
        expect(rows).toHaveLength(1);
        expect(rows.map((e) => [e.get(A), e.get(B)])).toEqual([[1, "x"]]);
    });

    test("seeds the index from entities already in the world", () => {
        world.add(entity(A.of(1)));
        world.add(entity(B.of("no")));
        world.add(entity(A.of(3)));

        const pred = world.addPred(hasA);
        expect(valuesOf(world.iterPred(pred))).toEqual([1, 3]);
    });

    test("skips removed entities without surfacing stale references", () => {
        const pred = world.addPred(hasA);
        const e1 = world.add(entity(A.of(5)));
        world.add(entity(A.of(9)));

        world.remove(e1);

        expect(valuesOf(world.iterPred(pred))).toEqual([9]);
    });

    test("retires stale ids lazily and compacts them on the next add", () => {
        const pred = world.addPred(hasA);
        const e1 = world.add(entity(A.of(1)));
        world.add(entity(A.of(2)));

        world.remove(e1);
        world.add(entity(A.of(3)));
        // Nothing has visited the stale id yet.
        expect(world.stats()).toMatchObject({ candidateSlots: 3, tombstones: 0 });

        expect(valuesOf(world.iterPred(pred))).toEqual([2, 3]);
        expect(world.stats()).toMatchObject({ candidateSlots: 3, tombstones: 1 });

        world.add(entity(B.of("unrelated")));
        expect(world.stats()).toMatchObject({ candidateSlots: 2, tombstones: 0 });
        expect(valuesOf(world.iterPred(pred))).toEqual([2, 3]);
    });

    test("keeps every index in sync on add", () => {
        const pa = world.addPred(hasA);
        const pc = world.addPred((e) => e.has(C));

        world.add(entity(A.of(1), C.of(10)));
        world.add(entity(C.of(20)));

        expect(valuesOf(world.iterPred(pa))).toEqual([1]);
        expect(Array.from(world.iterPred(pc) ?? [], (e) => e.get(C))).toEqual([10, 20]);
    });

    test("does not re-test entities whose components change after add", () => {
        const pred = world.addPred(hasA);
        const id = world.add(entity(A.of(1)));

        world.at(id).remove(A);

        const rows = Array.from(world.iterPred(pred) ?? []);
        expect(rows).toHaveLength(1);
        expect(rows[0]?.has(A)).toBe(false);
    });

    test("returns undefined for unknown predicate ids", () => {
        expect(world.iterPred(1)).toBeUndefined();
        expect(world.iterPredMut(42)).toBeUndefined();
    });

    test("removePred drops the index and never reuses its id", () => {
        const p1 = world.addPred(hasA);
        expect(world.removePred(p1)).toBe(true);
        expect(world.removePred(p1)).toBe(false);
        expect(world.hasPred(p1)).toBe(false);
        expect(world.iterPred(p1)).toBeUndefined();

        const p2 = world.addPred(hasA);
        expect(p1).toBe(1);
        expect(p2).toBe(2);
        expect(world.predicateCount).toBe(1);
    });

    test("an exhausted iterator stays exhausted", () => {
        const pred = world.addPred(hasA);
        world.add(entity(A.of(1)));

        const iter = world.iterPred(pred);
        expect(iter).toBeDefined();
        if (!iter) return;

        expect(Array.from(iter)).toHaveLength(1);
        expect(Array.from(iter)).toHaveLength(0);
        expect(iter.next().done).toBe(true);
    });

    test("iterPredMut hands out writable entities", () => {
        const pred = world.addPred(hasA);
        world.add(entity(A.of(1)));
        world.add(entity(A.of(2)));

        for (const e of world.iterPredMut(pred) ?? []) {
            const ref = e.getMut(A);
            if (ref) ref.value += 100;
            e.add(B.of("tagged"));
        }

        expect(Array.from(world.iterAll(), (e) => [e.get(A), e.get(B)])).toEqual([
            [101, "tagged"],
            [102, "tagged"]
        ]);
    });

    test("throws when the world is structurally modified mid-iteration", () => {
        const pred = world.addPred(hasA);
        world.add(entity(A.of(1)));
        world.add(entity(A.of(2)));

        const iter = world.iterPred(pred);
        if (!iter) throw new Error("predicate missing");
        iter.next();

        world.add(entity(A.of(3)));
        expect(() => iter.next()).toThrow(/structurally modified while iterating predicate #1/);
    });

    test("deferred commands apply after iterating", () => {
        const pred = world.addPred(hasA);
        const e1 = world.add(entity(A.of(1)));
        world.add(entity(A.of(2)));

        for (const e of world.iterPred(pred) ?? []) {
            world.cmd().add(entity(A.of((e.get(A) ?? 0) * 10)));
        }
        world.cmd().remove(e1);
        world.flush();

        expect(valuesOf(world.iterPred(pred))).toEqual([2, 10, 20]);
    });
});
