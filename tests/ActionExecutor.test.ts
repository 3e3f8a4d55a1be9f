import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { ConflictResolver } from '../src/conflicts/ConflictResolver';
import { InvalidActionError, TypeMismatchError } from '../src/errors';
import { EventBus } from '../src/events/EventBus';
import { ActionExecutor, ExecutionContext } from '../src/rules/ActionExecutor';
import type { WorldState } from '../src/state/state_types';
import { makeRule, makeWorld } from './fixtures';

const SPEED = 'agents.tugboat_1.speed';

describe('ActionExecutor', () => {
    let state: WorldState;
    let executor: ActionExecutor;
    let bus: EventBus;
    let ctx: ExecutionContext;
    let consoleWarnStub: sinon.SinonStub;

    beforeEach(() => {
        sinon.stub(console, 'debug');
        consoleWarnStub = sinon.stub(console, 'warn');
        state = makeWorld();
        const resolver = new ConflictResolver();
        resolver.beginTick(0);
        bus = new EventBus();
        bus.beginTick(0);
        executor = new ActionExecutor({ resolver, eventBus: bus, ruleExists: (id) => id === 'other' });
        ctx = { rule: makeRule('r1', 5, [], []), state };
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('SET', () => {
        it('should write the value and describe the change', () => {
            const application = executor.execute({ type: 'SET', target: SPEED, value: 5 }, ctx);
            expect(state.agents.tugboat_1.fields.speed).to.equal(5);
            expect(application.before).to.equal(6);
            expect(application.after).to.equal(5);
            expect(application.success).to.be.true;
            expect(application.message).to.equal('SET agents.tugboat_1.speed: 6 -> 5');
        });

        it('should evaluate expression values against the working state', () => {
            executor.execute({ type: 'SET', target: SPEED, value: '{{ agents.tugboat_1.speed + 2 }}' }, ctx);
            expect(state.agents.tugboat_1.fields.speed).to.equal(8);
        });

        it('should reject an action without a target', () => {
            expect(() => executor.execute({ type: 'SET', value: 5 }, ctx)).to.throw(InvalidActionError, "SET action requires 'target'");
        });

        it('should write an empty string value', () => {
            const application = executor.execute({ type: 'SET', target: 'environment.zone', value: '' }, ctx);
            expect(state.environment.zone).to.equal('');
            expect(application.success).to.be.true;
            expect(application.message).to.equal("SET environment.zone: 'open_water' -> ''");
        });

        it('should still reject a SET without a value', () => {
            expect(() => executor.execute({ type: 'SET', target: SPEED }, ctx)).to.throw(InvalidActionError, "SET action requires 'value'");
        });

        it('should annotate a write that caused a conflict', () => {
            executor.execute({ type: 'SET', target: SPEED, value: 3 }, { rule: makeRule('a', 2, [], []), state });
            const application = executor.execute({ type: 'SET', target: SPEED, value: 7 }, { rule: makeRule('b', 5, [], []), state });
            expect(application.conflictId).to.equal('conflict-0-1');
            expect(application.message).to.equal('SET agents.tugboat_1.speed: 3 -> 7 (conflict conflict-0-1: PRIORITY, final 7)');
        });
    });

    describe('ADD', () => {
        it('should add to the current value', () => {
            const application = executor.execute({ type: 'ADD', target: SPEED, value: 2 }, ctx);
            expect(state.agents.tugboat_1.fields.speed).to.equal(8);
            expect(application.message).to.equal('ADD 2 to agents.tugboat_1.speed: 6 -> 8');
        });

        it('should start an unset field from zero', () => {
            const application = executor.execute({ type: 'ADD', target: 'agents.tugboat_1.rpm', value: 100 }, ctx);
            expect(state.agents.tugboat_1.fields.rpm).to.equal(100);
            expect(application.message).to.equal('ADD 100 to agents.tugboat_1.rpm: absent -> 100');
        });

        it('should refuse to add to text', () => {
            expect(() => executor.execute({ type: 'ADD', target: 'agents.tugboat_1.mode', value: 1 }, ctx))
                .to.throw(TypeMismatchError, "Current value of agents.tugboat_1.mode must be numeric, got 'cruise'");
        });
    });

    describe('CLAMP', () => {
        it('should bound the current value', () => {
            const application = executor.execute({ type: 'CLAMP', target: SPEED, minValue: 0, maxValue: 5 }, ctx);
            expect(state.agents.tugboat_1.fields.speed).to.equal(5);
            expect(application.message).to.equal('CLAMP agents.tugboat_1.speed: 6 -> 5 (min=0, max=5)');
        });

        it('should resolve bounds given as paths', () => {
            executor.execute({ type: 'CLAMP', target: SPEED, minValue: 0, maxValue: 'agents.barge_1.speed' }, ctx);
            expect(state.agents.tugboat_1.fields.speed).to.equal(3);
        });

        it('should reject an inverted range', () => {
            expect(() => executor.execute({ type: 'CLAMP', target: SPEED, minValue: 5, maxValue: 1 }, ctx)).to.throw(InvalidActionError);
            expect(state.agents.tugboat_1.fields.speed).to.equal(6);
        });
    });

    it('should record a recommendation without touching state', () => {
        const application = executor.execute({ type: 'RECOMMEND', target: 'agents.tugboat_1.heading', value: 'global_metrics.distance' }, ctx);
        expect(state.agents.tugboat_1.fields.heading).to.equal(90);
        expect(application.recommendation).to.deep.equal({ target: 'agents.tugboat_1.heading', value: 40, current: 90 });
        expect(application.message).to.equal('RECOMMEND agents.tugboat_1.heading = 40 (current: 90, not enforced)');
    });

    describe('TRIGGER_RULE', () => {
        it('should return a trigger request for a known rule', () => {
            const application = executor.execute({ type: 'TRIGGER_RULE', ruleId: 'other' }, ctx);
            expect(application.triggerRequest).to.equal('other');
            expect(application.message).to.equal("TRIGGER_RULE: scheduling 'other'");
        });

        it('should reject an unknown rule', () => {
            expect(() => executor.execute({ type: 'TRIGGER_RULE', ruleId: 'nope' }, ctx))
                .to.throw(InvalidActionError, "TRIGGER_RULE references unknown rule 'nope'");
        });
    });

    it('should spawn an event with a resolved payload and expose it on the state', () => {
        const application = executor.execute({
            type: 'SPAWN_EVENT',
            eventType: 'fog',
            eventSeverity: 'warning',
            eventPayload: { visibility: 'environment.visibility', note: 'thick' },
        }, ctx);
        expect(application.event?.payload).to.deep.equal({ visibility: 1.2, note: 'thick' });
        expect(application.event?.sourceRule).to.equal('r1');
        expect(state.events.fog).to.equal(application.event);
        expect(bus.get('fog')).to.equal(application.event);
        expect(application.before).to.be.null;
        expect(application.after).to.equal(true);
        expect(application.message).to.equal('SPAWN_EVENT: fog activated (warning)');
    });

    it('should mirror LOG actions at their level', () => {
        const application = executor.execute({ type: 'LOG', logLevel: 'warning', logMessage: 'Check speed', target: SPEED }, ctx);
        expect(consoleWarnStub.calledOnceWith('[r1] Check speed')).to.be.true;
        expect(application.log).to.deep.equal({ level: 'warning', message: 'Check speed', target: SPEED, targetValue: 6 });
        expect(application.message).to.equal('LOG [WARNING]: Check speed (agents.tugboat_1.speed = 6)');
    });

    it('should build a failure record for an action that threw', () => {
        const failure = ActionExecutor.failure({ type: 'SET', target: SPEED, value: 1 }, new TypeMismatchError('bad'), 6);
        expect(failure).to.deep.equal({
            action: { type: 'SET', target: SPEED, value: 1 },
            before: 6,
            after: 6,
            success: false,
            message: 'SET failed: TypeMismatchError: bad',
        });
    });
});
