import * as path from 'path';
import { DEFAULT_MAX_CHAIN_DEPTH } from './engine/DecisionEngine';
import type { EventLifetime } from './events/EventBus';
import { ConflictStrategy, isConflictStrategy } from './rules/rule_types';

// Default paths and constants
export const DEFAULT_RULES_FILE_PATH = path.resolve(__dirname, '..', 'data', 'harbor_rules.json');
export const DEFAULT_SCENARIO = 'default';
export const DEFAULT_TICKS = 5;
export const DEFAULT_EVENT_LIFETIME: EventLifetime = 'tick';

export interface EngineSettings {
    rulesFile: string;
    maxChainDepth: number;
    /** Unset means the rule set's own policy applies. */
    conflictStrategy?: ConflictStrategy;
    eventLifetime: EventLifetime;
}

function parseDepth(raw: string): number {
    const depth = Number(raw);
    if (!Number.isInteger(depth) || depth < 0) {
        throw new Error(`SIM_MAX_CHAIN_DEPTH must be a non-negative integer, got '${raw}'`);
    }
    return depth;
}

/**
 * Reads engine settings from environment variables (after dotenv has loaded
 * `.env`), falling back to the defaults above. Invalid values throw.
 */
export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
    const settings: EngineSettings = {
        rulesFile: env.SIM_RULES_FILE || DEFAULT_RULES_FILE_PATH,
        maxChainDepth: env.SIM_MAX_CHAIN_DEPTH ? parseDepth(env.SIM_MAX_CHAIN_DEPTH) : DEFAULT_MAX_CHAIN_DEPTH,
        eventLifetime: DEFAULT_EVENT_LIFETIME,
    };
    const strategy = env.SIM_CONFLICT_STRATEGY;
    if (strategy) {
        if (!isConflictStrategy(strategy)) {
            throw new Error(`SIM_CONFLICT_STRATEGY must be one of PRIORITY, LAST_WRITE_WINS, MERGE, MANUAL_REVIEW; got '${strategy}'`);
        }
        settings.conflictStrategy = strategy;
    }
    const lifetime = env.SIM_EVENT_LIFETIME;
    if (lifetime) {
        if (lifetime !== 'tick' && lifetime !== 'persistent') {
            throw new Error(`SIM_EVENT_LIFETIME must be 'tick' or 'persistent', got '${lifetime}'`);
        }
        settings.eventLifetime = lifetime;
    }
    return settings;
}
