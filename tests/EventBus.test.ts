import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { EventBus } from '../src/events/EventBus';

describe('EventBus', () => {
    beforeEach(() => {
        sinon.stub(console, 'debug');
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should make a spawned event visible immediately with defaults filled in', () => {
        const bus = new EventBus();
        bus.beginTick(3);
        const event = bus.spawn({ eventType: 'fog', sourceRule: 'fog_rule' });
        expect(event.timestamp).to.equal(3);
        expect(event.severity).to.equal('normal');
        expect(event.payload).to.deep.equal({});
        expect(bus.get('fog')).to.equal(event);
        expect(bus.spawned()).to.deep.equal([event]);
    });

    it('should derive the same event ids for the same ticks', () => {
        const first = new EventBus();
        const second = new EventBus();
        first.beginTick(1);
        second.beginTick(1);
        const a = first.spawn({ eventType: 'fog', sourceRule: 'r1' });
        const b = second.spawn({ eventType: 'fog', sourceRule: 'r1' });
        expect(a.id).to.equal(b.id);
        expect(a.id).to.match(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);

        second.beginTick(2);
        expect(second.spawn({ eventType: 'fog', sourceRule: 'r1' }).id).to.not.equal(a.id);
    });

    it('should keep the latest event per type', () => {
        const bus = new EventBus();
        bus.beginTick(0);
        bus.spawn({ eventType: 'alarm', sourceRule: 'r1', severity: 'warning' });
        const latest = bus.spawn({ eventType: 'alarm', sourceRule: 'r2', severity: 'critical' });
        expect(Object.keys(bus.toRecord())).to.deep.equal(['alarm']);
        expect(bus.get('alarm')).to.equal(latest);
        expect(bus.spawned()).to.have.length(2);
    });

    it('should clear tick-scoped events when the next tick begins', () => {
        const bus = new EventBus('tick');
        bus.beginTick(0);
        bus.spawn({ eventType: 'fog', sourceRule: 'r1' });
        bus.beginTick(1);
        expect(bus.get('fog')).to.be.undefined;
        expect(bus.spawned()).to.deep.equal([]);
    });

    it('should keep persistent events until consumed', () => {
        const bus = new EventBus('persistent');
        bus.beginTick(0);
        bus.spawn({ eventType: 'fog', sourceRule: 'r1' });
        bus.beginTick(1);
        expect(bus.get('fog')?.sourceRule).to.equal('r1');
        expect(bus.consume('fog')).to.be.true;
        expect(bus.consume('fog')).to.be.false;
        expect(bus.toRecord()).to.deep.equal({});
    });
});
