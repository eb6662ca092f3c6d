import { World, entity } from "../src";
import { A, B, type TestStorage } from "./Mocks/Components.mock";

describe("World Stats", () => {
    let world: World<TestStorage>;

    beforeEach(() => {
        world = new World<TestStorage>();
    });

    describe("stats()", () => {
        it("returns initial stats for empty world", () => {
            expect(world.stats()).toEqual({
                entities: 0,
                predicates: 0,
                candidateSlots: 0,
                tombstones: 0,
                nextEntityId: 1,
                pendingCommands: false
            });
        });

        it("counts entities and the next id", () => {
            const e1 = world.add(entity(A.of(1)));
            world.add(entity(A.of(2)));
            world.remove(e1);

            expect(world.stats().entities).toBe(1);
            expect(world.stats().nextEntityId).toBe(3);
        });

        it("reports no next id once the id space is used up", () => {
            const last = new World<TestStorage>({ firstEntityId: Number.MAX_SAFE_INTEGER });
            expect(last.stats().nextEntityId).toBe(Number.MAX_SAFE_INTEGER);

            last.add(entity(A.of(1)));
            expect(last.stats().nextEntityId).toBeUndefined();
            expect(() => last.add(entity(A.of(2)))).toThrow(/exhausted/);
            expect(last.size).toBe(1);
        });

        it("sums candidate slots across predicates", () => {
            world.addPred((e) => e.has(A));
            world.addPred((e) => e.has(B));
            world.add(entity(A.of(1), B.of("x")));
            world.add(entity(A.of(2)));

            expect(world.stats()).toMatchObject({ predicates: 2, candidateSlots: 3, tombstones: 0 });
        });
    });

    describe("debug logging", () => {
        let debugSpy: jest.SpyInstance;

        beforeEach(() => {
            debugSpy = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        });

        afterEach(() => {
            debugSpy.mockRestore();
        });

        it("is silent by default", () => {
            world.addPred((e) => e.has(A));
            world.add(entity(A.of(1)));
            expect(debugSpy).not.toHaveBeenCalled();
        });

        it("logs predicate and compaction bookkeeping when enabled", () => {
            const w = new World<TestStorage>({ debugLogging: true });
            w.add(entity(A.of(1)));
            const pred = w.addPred((e) => e.has(A));
            const e2 = w.add(entity(A.of(2)));
            w.remove(e2);
            Array.from(w.iterPred(pred) ?? []);
            w.add(entity(B.of("x")));
            w.cmd().remove(1);
            w.flush();
            w.removePred(pred);

            expect(debugSpy.mock.calls.map((c) => c[0])).toEqual([
                "[World] predicate #1 registered with 1 candidate(s)",
                "[World] predicate #1: compacted 1 tombstone(s)",
                "[World] flushing 1 command(s)",
                "[World] predicate #1 removed"
            ]);
        });

        it("can be toggled at runtime", () => {
            world.setDebugLogging(true);
            world.addPred((e) => e.has(B));
            world.setDebugLogging(false);
            world.addPred((e) => e.has(A));

            expect(debugSpy).toHaveBeenCalledTimes(1);
            expect(debugSpy).toHaveBeenCalledWith("[World] predicate #1 registered with 0 candidate(s)");
        });
    });
});
