import { deepCopy, deepFreeze, dbg } from '../utils';
import { StateSnapshot, SystemState, WorldState, isValue } from './state_types';

/** Everything a tick produced besides the world itself. */
export type TickRecord = Omit<StateSnapshot, 'state'>;

/**
 * Holds the committed simulation state and its append-only history.
 *
 * Only committed (post-tick) data is ever handed out, and always frozen; a
 * tick works on a private copy obtained from `workingCopy()`.
 */
export class StateStore {
    private committed: WorldState;
    private readonly initial: WorldState;
    private readonly snapshots: StateSnapshot[] = [];

    /**
     * Creates a store from an initial world. The world is validated and
     * deep-copied, so later changes to the argument do not leak in.
     */
    static fromWorld(world: WorldState): StateStore {
        StateStore.validate(world);
        return new StateStore(world);
    }

    private constructor(world: WorldState) {
        this.initial = deepFreeze(deepCopy(world));
        this.committed = this.initial;
    }

    private static validate(world: WorldState): void {
        for (const [id, agent] of Object.entries(world.agents)) {
            if (agent.id !== id) {
                throw new Error(`StateStore: Agent keyed '${id}' declares id '${agent.id}'.`);
            }
            for (const [field, value] of Object.entries(agent.fields)) {
                if (!isValue(value)) {
                    throw new Error(`StateStore: Agent '${id}' field '${field}' is not a number, string, boolean or sequence.`);
                }
            }
        }
        for (const [name, value] of Object.entries(world.globalMetrics)) {
            if (typeof value !== 'number') {
                throw new Error(`StateStore: Global metric '${name}' must be numeric.`);
            }
        }
        if (!Number.isInteger(world.timeStep) || world.timeStep < 0) {
            throw new Error(`StateStore: timeStep must be a non-negative integer, got ${world.timeStep}.`);
        }
    }

    /** The last committed world (frozen). */
    current(): Readonly<WorldState> {
        return this.committed;
    }

    /** The world the store was created with (frozen). */
    initialWorld(): Readonly<WorldState> {
        return this.initial;
    }

    /** A mutable deep copy of the committed world for the next tick to work on. */
    workingCopy(): WorldState {
        return deepCopy(this.committed);
    }

    /** Freezes `world` as the new committed state and appends the tick's snapshot. */
    commit(world: WorldState, record: TickRecord): StateSnapshot {
        if (record.tick !== this.snapshots.length + this.initial.timeStep) {
            throw new Error(`StateStore: Expected tick ${this.snapshots.length + this.initial.timeStep}, got ${record.tick}.`);
        }
        const snapshot: StateSnapshot = deepFreeze(deepCopy({ ...record, state: world }));
        this.snapshots.push(snapshot);
        this.committed = snapshot.state;
        dbg(`StateStore: Committed tick ${snapshot.tick} (${this.snapshots.length} snapshot(s) in history).`);
        return snapshot;
    }

    /** Snapshot of a given tick number, or undefined if that tick has not run. */
    getSnapshot(tick: number): StateSnapshot | undefined {
        return this.snapshots[tick - this.initial.timeStep];
    }

    history(): readonly StateSnapshot[] {
        return this.snapshots;
    }

    /** Full SystemState view: committed world plus history. */
    toSystemState(): SystemState {
        return { ...deepCopy(this.committed), history: [...this.snapshots] };
    }

    replay(): ReplayCursor {
        return new ReplayCursor(this.snapshots);
    }
}

/**
 * Read-only cursor over committed snapshots for forward replay and rewind.
 * Nothing is re-executed; moving the cursor only re-reads history.
 */
export class ReplayCursor {
    private position = -1;

    constructor(private readonly snapshots: readonly StateSnapshot[]) {}

    /** Snapshot under the cursor; undefined before the first forward step. */
    current(): StateSnapshot | undefined {
        return this.position >= 0 ? this.snapshots[this.position] : undefined;
    }

    forward(): StateSnapshot | undefined {
        if (this.position + 1 >= this.snapshots.length) return undefined;
        this.position++;
        return this.snapshots[this.position];
    }

    back(): StateSnapshot | undefined {
        if (this.position <= 0) return undefined;
        this.position--;
        return this.snapshots[this.position];
    }

    /** Moves to the snapshot of `tick`. */
    seek(tick: number): StateSnapshot | undefined {
        const index = this.snapshots.findIndex(s => s.tick === tick);
        if (index === -1) return undefined;
        this.position = index;
        return this.snapshots[index];
    }
}
