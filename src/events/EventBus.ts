import * as uuid from 'uuid';
import { dbg } from '../utils';
import type { EventSeverity, SimEvent, Value } from '../state/state_types';

/** How long a spawned event stays visible. */
export type EventLifetime = 'tick' | 'persistent';

/** Namespace for deterministic event ids; two runs of the same ticks get the same ids. */
const EVENT_ID_NAMESPACE = '6f1c2a3e-8d4b-5c7a-9e10-2b3c4d5e6f70';

export interface SpawnRequest {
    eventType: string;
    sourceRule: string;
    payload?: Record<string, Value>;
    severity?: EventSeverity;
}

/**
 * Holds the events visible to conditions as `events.*`. One bus belongs to
 * one engine; the engine clears it at the start of every tick unless the
 * lifetime is 'persistent'.
 */
export class EventBus {
    private events: Map<string, SimEvent> = new Map();
    private spawnedThisTick: SimEvent[] = [];
    private currentTick = 0;

    constructor(private readonly lifetime: EventLifetime = 'tick') {}

    /** Starts a new tick, dropping the previous tick's events when they are tick-scoped. */
    beginTick(tick: number): void {
        this.currentTick = tick;
        this.spawnedThisTick = [];
        if (this.lifetime === 'tick' && this.events.size > 0) {
            dbg(`EventBus: Clearing ${this.events.size} event(s) from the previous tick.`);
            this.events.clear();
        }
    }

    /** Inserts (or overwrites) the event for `eventType`; it is visible immediately. */
    spawn(request: SpawnRequest): SimEvent {
        const sequence = this.spawnedThisTick.length;
        const event: SimEvent = {
            id: uuid.v5(`${this.currentTick}:${sequence}:${request.sourceRule}:${request.eventType}`, EVENT_ID_NAMESPACE),
            sourceRule: request.sourceRule,
            timestamp: this.currentTick,
            eventType: request.eventType,
            payload: { ...(request.payload ?? {}) },
            severity: request.severity ?? 'normal',
        };
        this.events.set(event.eventType, event);
        this.spawnedThisTick.push(event);
        dbg(`EventBus: Rule "${event.sourceRule}" spawned event "${event.eventType}" (${event.severity}).`);
        return event;
    }

    get(eventType: string): SimEvent | undefined {
        return this.events.get(eventType);
    }

    /** Removes an event before its lifetime ends. Returns false if it was not present. */
    consume(eventType: string): boolean {
        return this.events.delete(eventType);
    }

    /** Events spawned since the last `beginTick`, in spawn order. */
    spawned(): readonly SimEvent[] {
        return this.spawnedThisTick;
    }

    /** The visible events keyed by type, as exposed on the state tree. */
    toRecord(): Record<string, SimEvent> {
        const record: Record<string, SimEvent> = {};
        for (const [type, event] of this.events) {
            record[type] = event;
        }
        return record;
    }

    /** Replaces the visible events, e.g. when restoring a session from a snapshot. */
    load(events: Record<string, SimEvent>): void {
        this.events = new Map(Object.entries(events));
    }
}
