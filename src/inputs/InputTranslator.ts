import { TypeMismatchError } from '../errors';
import { isFieldPath } from '../state/pathResolver';
import type { Value, WorldState } from '../state/state_types';

/** A direct state write requested from outside the engine. */
export interface PathWrite {
    path: string;
    value: Value;
}

/** An input as it arrives from the front end: a named type plus parameters. */
export interface SimulationInput {
    type: string;
    params?: Record<string, Value>;
}

export type InputHandler = (params: Record<string, Value>, state: Readonly<WorldState>) => PathWrite[];

export const DEFAULT_CONTROLLED_AGENT = 'tugboat';
export const DEFAULT_DISTANCE_METRIC = 'tugboat_cargo_distance';

function numberParam(params: Record<string, Value>, name: string, inputType: string): number {
    const value = params[name];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeMismatchError(`Input '${inputType}' needs numeric '${name}', got ${JSON.stringify(value)}`);
    }
    return value;
}

function stringParam(params: Record<string, Value>, name: string, fallback: string): string {
    const value = params[name];
    return typeof value === 'string' && value.length > 0 ? value : fallback;
}

const BUILT_IN_HANDLERS: Record<string, InputHandler> = {
    write: (params) => {
        const path = params.path;
        if (!isFieldPath(path)) {
            throw new TypeMismatchError(`Input 'write' needs a field path, got ${JSON.stringify(path)}`);
        }
        if (params.value === undefined) {
            throw new TypeMismatchError(`Input 'write' for ${path} is missing 'value'`);
        }
        return [{ path, value: params.value }];
    },
    adjust_speed: (params) => {
        const agent = stringParam(params, 'agent', DEFAULT_CONTROLLED_AGENT);
        return [{ path: `agents.${agent}.speed`, value: numberParam(params, 'speed', 'adjust_speed') }];
    },
    change_angle: (params) => {
        const agent = stringParam(params, 'agent', DEFAULT_CONTROLLED_AGENT);
        return [{ path: `agents.${agent}.heading`, value: numberParam(params, 'heading', 'change_angle') }];
    },
    activate_docking_mode: () => [
        { path: 'environment.zone', value: 'docking_zone' },
        { path: 'environment.docking_mode', value: true },
    ],
    sensor_update_distance: (params) => {
        const metric = stringParam(params, 'metric', DEFAULT_DISTANCE_METRIC);
        return [{ path: `global_metrics.${metric}`, value: numberParam(params, 'distance', 'sensor_update_distance') }];
    },
    emergency_stop: (_params, state) =>
        Object.keys(state.agents).sort().map(id => ({ path: `agents.${id}.speed`, value: 0 })),
};

/** Shorthand for a raw `(path, value)` write input. */
export function writeInput(path: string, value: Value): SimulationInput {
    return { type: 'write', params: { path, value } };
}

export function describeInput(input: SimulationInput): string {
    const params = Object.entries(input.params ?? {})
        .map(([key, value]) => `${key}=${Array.isArray(value) ? `[${value.join(', ')}]` : String(value)}`)
        .join(', ');
    return `${input.type}(${params})`;
}

/**
 * Turns named inputs into path writes. Handlers for new input types can be
 * registered at run time.
 */
export class InputTranslator {
    private readonly handlers: Map<string, InputHandler>;

    constructor(extraHandlers: Record<string, InputHandler> = {}) {
        this.handlers = new Map(Object.entries({ ...BUILT_IN_HANDLERS, ...extraHandlers }));
    }

    register(type: string, handler: InputHandler): void {
        this.handlers.set(type, handler);
    }

    supportedTypes(): string[] {
        return [...this.handlers.keys()].sort();
    }

    translate(input: SimulationInput, state: Readonly<WorldState>): PathWrite[] {
        const handler = this.handlers.get(input.type);
        if (!handler) {
            throw new Error(`Unknown input type '${input.type}'. Supported: ${this.supportedTypes().join(', ')}`);
        }
        return handler(input.params ?? {}, state);
    }
}

/** Reads a command-line literal: booleans and numbers are typed, anything else stays text. */
export function parseLiteral(raw: string): Value {
    const text = raw.trim();
    if (text === 'true') return true;
    if (text === 'false') return false;
    if (/^-?\d+(\.\d+)?$/.test(text)) return Number(text);
    return text;
}

/**
 * Parses the CLI form of an input, `type[:key=value,key=value]`, for example
 * `adjust_speed:speed=3` or `write:path=agents.tugboat.speed,value=8`.
 */
export function parseInputSpec(spec: string): SimulationInput {
    const separator = spec.indexOf(':');
    const type = (separator === -1 ? spec : spec.slice(0, separator)).trim();
    if (!type) {
        throw new Error(`Input '${spec}' has no type`);
    }
    const params: Record<string, Value> = {};
    const rest = separator === -1 ? '' : spec.slice(separator + 1);
    for (const pair of rest.split(',').filter(p => p.trim().length > 0)) {
        const eq = pair.indexOf('=');
        if (eq <= 0) {
            throw new Error(`Input '${spec}': expected key=value, got '${pair}'`);
        }
        params[pair.slice(0, eq).trim()] = parseLiteral(pair.slice(eq + 1));
    }
    return { type, params };
}
