import { TypeMismatchError, UnknownAgentError, UnknownPathError } from '../errors';
import { ABSENT, ResolvedValue, Scalar, Value, WorldState, isScalar } from './state_types';

export const PATH_CONTAINERS = ['agents', 'environment', 'global_metrics', 'events'] as const;
export type PathContainer = typeof PATH_CONTAINERS[number];

export type ParsedPath =
    | { container: 'agents'; agentId: string; field: string }
    | { container: 'environment'; field: string }
    | { container: 'global_metrics'; metric: string }
    | { container: 'events'; eventType: string; key: string | null };

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Event fields readable as `events.<type>.<field>`; anything else is looked up in the payload. */
const EVENT_FIELDS = ['id', 'sourceRule', 'timestamp', 'eventType', 'severity'] as const;

/**
 * Parses a dotted field path. Returns null when the string is not a
 * syntactically valid path, in which case callers treat it as a literal.
 */
export function parsePath(path: string): ParsedPath | null {
    const segments = path.split('.');
    if (!segments.every(s => SEGMENT_PATTERN.test(s))) {
        return null;
    }
    const [container, ...rest] = segments;
    switch (container) {
        case 'agents':
            return rest.length === 2 ? { container, agentId: rest[0], field: rest[1] } : null;
        case 'environment':
            return rest.length === 1 ? { container, field: rest[0] } : null;
        case 'global_metrics':
            return rest.length === 1 ? { container, metric: rest[0] } : null;
        case 'events':
            if (rest.length === 1) return { container, eventType: rest[0], key: null };
            if (rest.length === 2) return { container, eventType: rest[0], key: rest[1] };
            return null;
        default:
            return null;
    }
}

export function isFieldPath(value: unknown): value is string {
    return typeof value === 'string' && parsePath(value) !== null;
}

function requirePath(path: string): ParsedPath {
    const parsed = parsePath(path);
    if (!parsed) {
        throw new UnknownPathError(path, `expected one of ${PATH_CONTAINERS.join(', ')} followed by the right number of segments`);
    }
    return parsed;
}

/**
 * Reads the value at `path`. Missing agents, fields and metrics raise
 * UnknownPathError; unset `events.*` paths read as ABSENT.
 */
export function resolvePath(state: WorldState, path: string): ResolvedValue {
    const parsed = requirePath(path);
    switch (parsed.container) {
        case 'agents': {
            const agent = state.agents[parsed.agentId];
            if (!agent) throw new UnknownPathError(path, `no agent '${parsed.agentId}'`);
            if (!(parsed.field in agent.fields)) throw new UnknownPathError(path, `agent '${parsed.agentId}' has no field '${parsed.field}'`);
            return agent.fields[parsed.field];
        }
        case 'environment':
            if (!(parsed.field in state.environment)) throw new UnknownPathError(path, `no environment field '${parsed.field}'`);
            return state.environment[parsed.field];
        case 'global_metrics':
            if (!(parsed.metric in state.globalMetrics)) throw new UnknownPathError(path, `no global metric '${parsed.metric}'`);
            return state.globalMetrics[parsed.metric];
        case 'events': {
            const event = state.events[parsed.eventType];
            if (!event) return ABSENT;
            if (parsed.key === null) return true;
            const key = parsed.key;
            const field = EVENT_FIELDS.find(f => f === key);
            if (field) return event[field];
            return key in event.payload ? event.payload[key] : ABSENT;
        }
    }
}

/**
 * Reads the current value at a writable path, returning undefined when the
 * leaf has never been written. Used by actions that fall back to a default.
 */
export function peekPath(state: WorldState, path: string): Value | undefined {
    const parsed = requirePath(path);
    switch (parsed.container) {
        case 'agents': {
            const agent = state.agents[parsed.agentId];
            if (!agent) throw new UnknownAgentError(parsed.agentId);
            return agent.fields[parsed.field];
        }
        case 'environment':
            return state.environment[parsed.field];
        case 'global_metrics':
            return state.globalMetrics[parsed.metric];
        case 'events':
            throw new UnknownPathError(path, 'events are read-only; use SPAWN_EVENT');
    }
}

/**
 * Writes `value` at `path`, creating the leaf field on first write. Agents
 * are never created implicitly.
 */
export function writePath(state: WorldState, path: string, value: Value): void {
    const parsed = requirePath(path);
    switch (parsed.container) {
        case 'agents': {
            const agent = state.agents[parsed.agentId];
            if (!agent) throw new UnknownAgentError(parsed.agentId);
            agent.fields[parsed.field] = Array.isArray(value) ? [...value] : value;
            return;
        }
        case 'environment':
            state.environment[parsed.field] = requireScalar(path, value);
            return;
        case 'global_metrics':
            if (typeof value !== 'number' || !Number.isFinite(value)) {
                throw new TypeMismatchError(`Global metric '${path}' must be a finite number, got ${JSON.stringify(value)}`);
            }
            state.globalMetrics[parsed.metric] = value;
            return;
        case 'events':
            throw new UnknownPathError(path, 'events are read-only; use SPAWN_EVENT');
    }
}

/** Removes a leaf written during the current tick, restoring the "never written" state. */
export function unsetPath(state: WorldState, path: string): void {
    const parsed = requirePath(path);
    switch (parsed.container) {
        case 'agents': {
            const agent = state.agents[parsed.agentId];
            if (!agent) throw new UnknownAgentError(parsed.agentId);
            delete agent.fields[parsed.field];
            return;
        }
        case 'environment':
            delete state.environment[parsed.field];
            return;
        case 'global_metrics':
            delete state.globalMetrics[parsed.metric];
            return;
        case 'events':
            throw new UnknownPathError(path, 'events are read-only; use SPAWN_EVENT');
    }
}

function requireScalar(path: string, value: Value): Scalar {
    if (!isScalar(value)) {
        throw new TypeMismatchError(`Environment field '${path}' must be a scalar, got a sequence`);
    }
    return value;
}
