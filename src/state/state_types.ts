import type { ConflictRecord } from '../conflicts/conflict_types';
import type { Explanation } from '../explanations/explanation_types';

export type Scalar = number | string | boolean;

/** Any value that can live in the state tree. */
export type Value = Scalar | Scalar[];

/**
 * A value read from the state. `null` is the "absent" marker returned for
 * unset `events.*` paths.
 */
export type ResolvedValue = Value | null;

export const ABSENT = null;

export type EventSeverity = 'normal' | 'warning' | 'critical';

export interface SimEvent {
    id: string;
    sourceRule: string;
    /** Tick in which the event was spawned. */
    timestamp: number;
    eventType: string;
    payload: Record<string, Value>;
    severity: EventSeverity;
}

export interface AgentState {
    /** Stable key, immutable after creation. */
    id: string;
    fields: Record<string, Value>;
}

/** The state tree without its history; this is what a tick works on. */
export interface WorldState {
    agents: Record<string, AgentState>;
    environment: Record<string, Scalar>;
    globalMetrics: Record<string, number>;
    timeStep: number;
    /** Most recent event per event type. */
    events: Record<string, SimEvent>;
}

export interface SystemState extends WorldState {
    history: StateSnapshot[];
}

export interface InputFailure {
    input: string;
    error: string;
}

export interface ChainOverflowDiagnostic {
    ruleId: string;
    triggeredBy: string;
    depth: number;
    maxDepth: number;
    /** Rule ids from the chain root down to the rule that overflowed. */
    chain: string[];
}

export interface TickStats {
    rulesEvaluated: number;
    rulesTriggered: number;
    actionsApplied: number;
    actionsFailed: number;
    conflicts: number;
    eventsSpawned: number;
}

/**
 * Immutable record of one committed tick. `state` is the world after the
 * tick (its `timeStep` is already advanced past `tick`).
 */
export interface StateSnapshot {
    tick: number;
    state: WorldState;
    explanations: Explanation[];
    conflicts: ConflictRecord[];
    inputsApplied: string[];
    inputFailures: InputFailure[];
    chainOverflow: ChainOverflowDiagnostic | null;
    stats: TickStats;
}

export function isScalar(value: unknown): value is Scalar {
    return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

export function isValue(value: unknown): value is Value {
    return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}
