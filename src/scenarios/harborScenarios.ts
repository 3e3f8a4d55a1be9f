import type { WorldState } from '../state/state_types';

export const SCENARIO_NAMES = ['default', 'fog', 'docking', 'emergency'] as const;
export type ScenarioName = typeof SCENARIO_NAMES[number];

export function isScenarioName(value: unknown): value is ScenarioName {
    return typeof value === 'string' && SCENARIO_NAMES.some(name => name === value);
}

/**
 * Harbour escort at the start of the exhibit: the tugboat cruises east in open
 * water 50 m behind the cargo ship it escorts.
 */
export function createDefaultScenario(): WorldState {
    return {
        agents: {
            tugboat: {
                id: 'tugboat',
                fields: { type: 'tugboat', position_x: 0, position_y: 0, speed: 8, heading: 90 },
            },
            cargo_ship: {
                id: 'cargo_ship',
                fields: { type: 'cargo_ship', position_x: 50, position_y: 0, speed: 6, heading: 90 },
            },
        },
        environment: {
            wind_speed: 10,
            wind_direction: 45,
            visibility: 1.5,
            zone: 'open_water',
            berth_heading: 0,
        },
        globalMetrics: {
            tugboat_cargo_distance: 50,
            collision_risk: 0,
            anchor_deployed: 0,
            engine_status: 1,
            guidance_requested: 0,
            heading_error: 0,
            distance_to_berth: 500,
        },
        timeStep: 0,
        events: {},
    };
}

/** Fog at the harbour entrance: visibility drops to 200 m. */
export function createFogScenario(): WorldState {
    const state = createDefaultScenario();
    state.environment.visibility = 0.2;
    state.environment.zone = 'harbour_entry';
    return state;
}

/** Final approach: 3 m from the berth and 25 degrees off its heading. */
export function createDockingScenario(): WorldState {
    const state = createDefaultScenario();
    state.environment.zone = 'docking_zone';
    state.globalMetrics.heading_error = 25;
    state.globalMetrics.distance_to_berth = 3;
    state.agents.tugboat.fields.speed = 4;
    state.agents.tugboat.fields.heading = 65;
    return state;
}

/** Engine failure at 10 knots; exercises the failure -> anchor rule chain. */
export function createEmergencyScenario(): WorldState {
    const state = createDefaultScenario();
    state.globalMetrics.engine_status = 0;
    state.agents.tugboat.fields.speed = 10;
    return state;
}

const FACTORIES: Record<ScenarioName, () => WorldState> = {
    default: createDefaultScenario,
    fog: createFogScenario,
    docking: createDockingScenario,
    emergency: createEmergencyScenario,
};

/** A fresh initial state for the named scenario. */
export function createScenario(name: ScenarioName): WorldState {
    return FACTORIES[name]();
}
