import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { StateStore, TickRecord } from '../src/state/StateStore';
import { makeWorld } from './fixtures';

function record(tick: number): TickRecord {
    return {
        tick,
        explanations: [],
        conflicts: [],
        inputsApplied: [],
        inputFailures: [],
        chainOverflow: null,
        stats: { rulesEvaluated: 0, rulesTriggered: 0, actionsApplied: 0, actionsFailed: 0, conflicts: 0, eventsSpawned: 0 },
    };
}

function advance(store: StateStore, speed: number) {
    const working = store.workingCopy();
    const tick = working.timeStep;
    working.agents.tugboat_1.fields.speed = speed;
    working.timeStep = tick + 1;
    return store.commit(working, record(tick));
}

describe('StateStore', () => {
    beforeEach(() => {
        sinon.stub(console, 'debug');
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should reject an agent keyed under a different id', () => {
        const world = makeWorld();
        world.agents.tugboat_1.id = 'tugboat_2';
        expect(() => StateStore.fromWorld(world)).to.throw("Agent keyed 'tugboat_1' declares id 'tugboat_2'");
    });

    it('should reject a negative time step', () => {
        const world = makeWorld();
        world.timeStep = -1;
        expect(() => StateStore.fromWorld(world)).to.throw('timeStep must be a non-negative integer');
    });

    it('should copy the initial world instead of keeping a reference', () => {
        const world = makeWorld();
        const store = StateStore.fromWorld(world);
        world.agents.tugboat_1.fields.speed = 99;
        expect(store.current().agents.tugboat_1.fields.speed).to.equal(6);
    });

    it('should hand out working copies that do not touch the committed state', () => {
        const store = StateStore.fromWorld(makeWorld());
        const working = store.workingCopy();
        working.agents.tugboat_1.fields.speed = 1;
        expect(store.current().agents.tugboat_1.fields.speed).to.equal(6);
    });

    it('should commit frozen snapshots and index them by tick', () => {
        const store = StateStore.fromWorld(makeWorld());
        const first = advance(store, 5);
        const second = advance(store, 4);

        expect(first.tick).to.equal(0);
        expect(second.tick).to.equal(1);
        expect(store.current().timeStep).to.equal(2);
        expect(store.current().agents.tugboat_1.fields.speed).to.equal(4);
        expect(store.getSnapshot(0)?.state.agents.tugboat_1.fields.speed).to.equal(5);
        expect(store.getSnapshot(2)).to.be.undefined;
        expect(Object.isFrozen(first.state.agents.tugboat_1.fields)).to.be.true;
        expect(store.history()).to.have.length(2);
        expect(store.initialWorld().agents.tugboat_1.fields.speed).to.equal(6);
    });

    it('should refuse a snapshot out of sequence', () => {
        const store = StateStore.fromWorld(makeWorld());
        expect(() => store.commit(store.workingCopy(), record(3))).to.throw('Expected tick 0, got 3');
    });

    it('should number ticks from a non-zero starting time step', () => {
        const world = makeWorld();
        world.timeStep = 10;
        const store = StateStore.fromWorld(world);
        expect(advance(store, 5).tick).to.equal(10);
        expect(store.getSnapshot(10)?.state.timeStep).to.equal(11);
    });

    it('should expose history on the system state view', () => {
        const store = StateStore.fromWorld(makeWorld());
        advance(store, 5);
        const system = store.toSystemState();
        expect(system.timeStep).to.equal(1);
        expect(system.history.map(s => s.tick)).to.deep.equal([0]);
    });

    describe('ReplayCursor', () => {
        it('should step forward and back over history without re-running anything', () => {
            const store = StateStore.fromWorld(makeWorld());
            advance(store, 5);
            advance(store, 4);
            advance(store, 3);
            const cursor = store.replay();

            expect(cursor.current()).to.be.undefined;
            expect(cursor.back()).to.be.undefined;
            expect(cursor.forward()?.tick).to.equal(0);
            expect(cursor.forward()?.tick).to.equal(1);
            expect(cursor.back()?.tick).to.equal(0);
            expect(cursor.seek(2)?.state.agents.tugboat_1.fields.speed).to.equal(3);
            expect(cursor.forward()).to.be.undefined;
            expect(cursor.current()?.tick).to.equal(2);
            expect(cursor.seek(7)).to.be.undefined;
        });

        it('should see ticks committed after it was created', () => {
            const store = StateStore.fromWorld(makeWorld());
            const cursor = store.replay();
            advance(store, 5);
            expect(cursor.forward()?.tick).to.equal(0);
        });
    });
});
