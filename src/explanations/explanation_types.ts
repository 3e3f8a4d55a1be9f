import type { Action, Condition, ConditionLogic, LogLevel } from '../rules/rule_types';
import type { ResolvedValue, SimEvent } from '../state/state_types';
import type { SimulationErrorCode } from '../errors';

export interface ConditionEvaluation {
    condition: Condition;
    leftValue: ResolvedValue;
    rightValue: ResolvedValue;
    result: boolean;
    /** Human-readable trace, e.g. `agents.tugboat.speed [8] > 7 [7] -> true`. */
    message: string;
    /** Rules that spawned any event this condition read. */
    eventSources: string[];
    error?: RecordedError;
}

export interface LogEntry {
    level: LogLevel;
    message: string;
    target?: string;
    targetValue?: ResolvedValue;
}

export interface Recommendation {
    target: string;
    value: ResolvedValue;
    current: ResolvedValue;
}

export interface ActionApplication {
    action: Action;
    before: ResolvedValue;
    after: ResolvedValue;
    success: boolean;
    message: string;
    event?: SimEvent;
    log?: LogEntry;
    triggerRequest?: string;
    recommendation?: Recommendation;
    /** Conflict record produced by this write, if any. */
    conflictId?: string;
}

export interface RecordedError {
    name: string;
    code?: SimulationErrorCode;
    message: string;
}

export interface ConditionMet {
    left: string;
    operator: string;
    right: string;
    leftValue: ResolvedValue;
    rightValue: ResolvedValue;
}

export interface CauseSummary {
    logic: ConditionLogic;
    conditionsMet: ConditionMet[];
    triggeredBy: string | null;
    /** Values observed while evaluating conditions, keyed by field path. */
    values: Record<string, ResolvedValue>;
}

export interface StateChange {
    type: Action['type'];
    target: string;
    from: ResolvedValue;
    to: ResolvedValue;
}

export interface EffectSummary {
    changes: StateChange[];
    recommendations: Recommendation[];
    eventsSpawned: string[];
    rulesTriggered: string[];
    /** Values after this rule's actions, keyed by target path. */
    values: Record<string, ResolvedValue>;
}

export interface Explanation {
    ruleId: string;
    priority: number;
    triggered: boolean;
    timestamp: number;
    conditionsEvaluated: ConditionEvaluation[];
    logicUsed: ConditionLogic;
    /** Index of the condition that settled the AND/OR outcome, null when none did. */
    decidedBy: number | null;
    actionsApplied: ActionApplication[];
    sideEffects: string[];
    /** Ids of events spawned by this rule. */
    eventsGenerated: string[];
    /** Ids of conflict records this rule took part in. */
    conflictsEncountered: string[];
    triggeredBy: string | null;
    triggeredRules: string[];
    message: string;
    cause: CauseSummary;
    effect: EffectSummary;
    errors: RecordedError[];
}

/** Shape consumed by the exhibit's explanation panel. */
export interface EducationalExplanation {
    ruleId: string;
    priority: number;
    triggered: boolean;
    when: string;
    why: {
        conditions: Array<{ condition: string; actualValues: string; result: boolean; explanation: string }>;
        logic: ConditionLogic;
    };
    whatHappened: {
        actions: Array<{ action: Action['type']; target: string; changedFrom: ResolvedValue; changedTo: ResolvedValue; explanation: string }>;
    };
    sideEffects: string[];
    causalChain: {
        triggeredBy: string | null;
        triggeredRules: string[];
        events: string[];
    };
    message: string;
}
