import type { EventSeverity, Value } from '../state/state_types';

export const OPERATORS = ['<', '>', '<=', '>=', '==', '!=', 'in'] as const;
export type Operator = typeof OPERATORS[number];

export const ACTION_TYPES = ['SET', 'ADD', 'CLAMP', 'RECOMMEND', 'TRIGGER_RULE', 'SPAWN_EVENT', 'LOG'] as const;
export type ActionType = typeof ACTION_TYPES[number];

export const CONDITION_LOGICS = ['AND', 'OR'] as const;
export type ConditionLogic = typeof CONDITION_LOGICS[number];

export const CONFLICT_STRATEGIES = ['PRIORITY', 'LAST_WRITE_WINS', 'MERGE', 'MANUAL_REVIEW'] as const;
export type ConflictStrategy = typeof CONFLICT_STRATEGIES[number];

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

/** Either side may be a field path (resolved) or a literal. */
export interface Condition {
    left: Value;
    operator: Operator;
    right: Value;
}

export interface Action {
    type: ActionType;
    target?: string;
    /** Literal, field path, or `{{ expression }}`. */
    value?: Value;
    minValue?: number | string;
    maxValue?: number | string;
    ruleId?: string;
    eventType?: string;
    eventPayload?: Record<string, Value>;
    eventSeverity?: EventSeverity;
    logLevel?: LogLevel;
    logMessage?: string;
    metadata?: Record<string, unknown>;
}

export interface Rule {
    id: string;
    priority: number;
    conditions: Condition[];
    logic: ConditionLogic;
    action: Action[];
    explanationTemplate: string;
    /** Opaque to the engine apart from `conflictStrategy`. */
    metadata: Record<string, unknown>;
}

/** Rule-set level conflict policy, consulted when neither action nor rule names a strategy. */
export interface ConflictPolicy {
    strategy: ConflictStrategy;
    /** Rules whose conflicts always go to manual review. */
    manualReviewRules: string[];
    /** Conflicts where every involved rule is listed here are merged. */
    mergeRules: string[];
}

export interface RuleSet {
    rules: Rule[];
    conflictPolicy: ConflictPolicy;
}

export function isConflictStrategy(value: unknown): value is ConflictStrategy {
    return typeof value === 'string' && (CONFLICT_STRATEGIES as readonly string[]).includes(value);
}
