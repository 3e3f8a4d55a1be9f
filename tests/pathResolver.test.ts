import { expect } from 'chai';
import { describe, it } from 'mocha';
import { TypeMismatchError, UnknownAgentError, UnknownPathError } from '../src/errors';
import { isFieldPath, parsePath, peekPath, resolvePath, unsetPath, writePath } from '../src/state/pathResolver';
import type { WorldState } from '../src/state/state_types';
import { makeWorld } from './fixtures';

function withEvent(state: WorldState): WorldState {
    state.events.fog = {
        id: 'evt-1',
        sourceRule: 'fog_rule',
        timestamp: 0,
        eventType: 'fog',
        payload: { visibility: 0.2 },
        severity: 'warning',
    };
    return state;
}

describe('pathResolver', () => {
    describe('parsePath', () => {
        it('should parse each container shape', () => {
            expect(parsePath('agents.tugboat_1.speed')).to.deep.equal({ container: 'agents', agentId: 'tugboat_1', field: 'speed' });
            expect(parsePath('environment.zone')).to.deep.equal({ container: 'environment', field: 'zone' });
            expect(parsePath('global_metrics.distance')).to.deep.equal({ container: 'global_metrics', metric: 'distance' });
            expect(parsePath('events.fog')).to.deep.equal({ container: 'events', eventType: 'fog', key: null });
            expect(parsePath('events.fog.severity')).to.deep.equal({ container: 'events', eventType: 'fog', key: 'severity' });
        });

        it('should return null for strings that are not paths', () => {
            expect(parsePath('docking_zone')).to.be.null;
            expect(parsePath('agents.tugboat_1')).to.be.null;
            expect(parsePath('weather.wind')).to.be.null;
            expect(parsePath('environment.zone name')).to.be.null;
            expect(isFieldPath('hello world')).to.be.false;
            expect(isFieldPath(42)).to.be.false;
        });
    });

    describe('resolvePath', () => {
        it('should read agent fields, environment and metrics', () => {
            const state = makeWorld();
            expect(resolvePath(state, 'agents.tugboat_1.speed')).to.equal(6);
            expect(resolvePath(state, 'agents.barge_1.cargo')).to.deep.equal(['coal', 'timber']);
            expect(resolvePath(state, 'environment.zone')).to.equal('open_water');
            expect(resolvePath(state, 'global_metrics.distance')).to.equal(40);
        });

        it('should raise UnknownPathError for missing agents and fields', () => {
            const state = makeWorld();
            expect(() => resolvePath(state, 'agents.ghost.speed')).to.throw(UnknownPathError, "no agent 'ghost'");
            expect(() => resolvePath(state, 'agents.tugboat_1.rpm')).to.throw(UnknownPathError);
            expect(() => resolvePath(state, 'environment.tide')).to.throw(UnknownPathError);
            expect(() => resolvePath(state, 'global_metrics.nothing')).to.throw(UnknownPathError);
            expect(() => resolvePath(state, 'bogus')).to.throw(UnknownPathError);
        });

        it('should read events as present, absent or by field', () => {
            const state = withEvent(makeWorld());
            expect(resolvePath(state, 'events.fog')).to.equal(true);
            expect(resolvePath(state, 'events.collision')).to.be.null;
            expect(resolvePath(state, 'events.fog.severity')).to.equal('warning');
            expect(resolvePath(state, 'events.fog.sourceRule')).to.equal('fog_rule');
            expect(resolvePath(state, 'events.fog.visibility')).to.equal(0.2);
            expect(resolvePath(state, 'events.fog.missing')).to.be.null;
        });
    });

    describe('writePath', () => {
        it('should create a new agent field on first write', () => {
            const state = makeWorld();
            writePath(state, 'agents.tugboat_1.rpm', 1200);
            expect(state.agents.tugboat_1.fields.rpm).to.equal(1200);
        });

        it('should never create agents implicitly', () => {
            const state = makeWorld();
            expect(() => writePath(state, 'agents.ghost.speed', 1)).to.throw(UnknownAgentError);
            expect(state.agents).to.not.have.property('ghost');
        });

        it('should reject non-numeric metrics and sequences in the environment', () => {
            const state = makeWorld();
            expect(() => writePath(state, 'global_metrics.distance', 'far')).to.throw(TypeMismatchError);
            expect(() => writePath(state, 'environment.zone', ['a', 'b'])).to.throw(TypeMismatchError);
        });

        it('should refuse to write events', () => {
            const state = makeWorld();
            expect(() => writePath(state, 'events.fog', true)).to.throw(UnknownPathError, 'read-only');
        });

        it('should copy sequences instead of aliasing them', () => {
            const state = makeWorld();
            const cargo = ['steel'];
            writePath(state, 'agents.barge_1.cargo', cargo);
            cargo.push('grain');
            expect(state.agents.barge_1.fields.cargo).to.deep.equal(['steel']);
        });
    });

    describe('peekPath and unsetPath', () => {
        it('should return undefined for a field that was never written', () => {
            const state = makeWorld();
            expect(peekPath(state, 'agents.tugboat_1.rpm')).to.be.undefined;
            expect(peekPath(state, 'environment.zone')).to.equal('open_water');
        });

        it('should remove a written field', () => {
            const state = makeWorld();
            writePath(state, 'environment.tide', 'high');
            unsetPath(state, 'environment.tide');
            expect(peekPath(state, 'environment.tide')).to.be.undefined;
        });
    });
});
