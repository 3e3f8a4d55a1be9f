import type { Action, Condition, Rule } from '../src/rules/rule_types';
import type { WorldState } from '../src/state/state_types';

/** A small two-vessel world used across the engine tests. */
export function makeWorld(): WorldState {
    return {
        agents: {
            tugboat_1: { id: 'tugboat_1', fields: { speed: 6, heading: 90, mode: 'cruise' } },
            barge_1: { id: 'barge_1', fields: { speed: 3, cargo: ['coal', 'timber'] } },
        },
        environment: { visibility: 1.2, zone: 'open_water' },
        globalMetrics: { collision_risk: 0, distance: 40 },
        timeStep: 0,
        events: {},
    };
}

export function makeRule(
    id: string,
    priority: number,
    conditions: Condition[],
    action: Action[],
    extra: Partial<Omit<Rule, 'id' | 'priority' | 'conditions' | 'action'>> = {}
): Rule {
    return {
        id,
        priority,
        conditions,
        logic: extra.logic ?? 'AND',
        action,
        explanationTemplate: extra.explanationTemplate ?? '',
        metadata: extra.metadata ?? {},
    };
}

export const ALWAYS: Condition[] = [];
