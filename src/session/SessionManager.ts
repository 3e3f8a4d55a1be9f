import { v4 as uuidv4 } from 'uuid';
import { DecisionEngine, DecisionEngineOptions } from '../engine/DecisionEngine';
import type { RuleSet } from '../rules/rule_types';
import { SCENARIO_NAMES, ScenarioName, createScenario, isScenarioName } from '../scenarios/harborScenarios';
import { dbg } from '../utils';

/** One visitor's run of the simulation: its own engine, state and history. */
export interface Session {
    id: string;
    scenario: ScenarioName;
    engine: DecisionEngine;
}

/**
 * Keeps independent simulation sessions side by side. Sessions share the
 * rule set but nothing else.
 */
export class SessionManager {
    private readonly sessions: Map<string, Session> = new Map();

    constructor(
        private readonly ruleSet: RuleSet,
        private readonly engineOptions: DecisionEngineOptions = {},
        private readonly idFn: () => string = uuidv4
    ) {}

    create(scenario: string = 'default'): Session {
        if (!isScenarioName(scenario)) {
            throw new Error(`Unknown scenario '${scenario}'. Available: ${SCENARIO_NAMES.join(', ')}`);
        }
        const session: Session = { id: this.idFn(), scenario, engine: this.newEngine(scenario) };
        this.sessions.set(session.id, session);
        dbg(`SessionManager: Created session ${session.id} (scenario=${scenario}).`);
        return session;
    }

    get(sessionId: string): Session | undefined {
        return this.sessions.get(sessionId);
    }

    require(sessionId: string): Session {
        const session = this.get(sessionId);
        if (!session) {
            throw new Error(`Session not found: '${sessionId}'`);
        }
        return session;
    }

    /** Restarts a session from its scenario's initial state, dropping its history. */
    reset(sessionId: string): Session {
        const session = this.require(sessionId);
        session.engine = this.newEngine(session.scenario);
        dbg(`SessionManager: Reset session ${sessionId}.`);
        return session;
    }

    delete(sessionId: string): boolean {
        return this.sessions.delete(sessionId);
    }

    get activeCount(): number {
        return this.sessions.size;
    }

    private newEngine(scenario: ScenarioName): DecisionEngine {
        return new DecisionEngine(createScenario(scenario), this.ruleSet, this.engineOptions);
    }
}
