import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_CONFLICT_POLICY } from '../conflicts/ConflictResolver';
import { isFieldPath } from '../state/pathResolver';
import { EventSeverity, Value, isValue } from '../state/state_types';
import { dbg } from '../utils';
import {
    ACTION_TYPES,
    Action,
    CONDITION_LOGICS,
    Condition,
    ConditionLogic,
    ConflictPolicy,
    LOG_LEVELS,
    LogLevel,
    OPERATORS,
    Operator,
    Rule,
    RuleSet,
    isConflictStrategy,
} from './rule_types';
import { isExpression } from './valueExpression';

export interface RuleSetServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
}

/** One line of the rules overview shown by the CLI. */
export interface RuleSummary {
    id: string;
    priority: number;
    logic: ConditionLogic;
    conditions: number;
    actions: number;
    category: string | null;
    tags: string[];
}

const SEVERITIES: readonly EventSeverity[] = ['normal', 'warning', 'critical'];
const EVENT_TYPE_PATTERN = /^[A-Za-z0-9_-]+$/;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
    return typeof value === 'string' && options.some(o => o === value);
}

/** A CLAMP bound: a number, a field path or a `{{ expression }}`. */
function isBound(value: unknown): value is number | string {
    return (typeof value === 'number' && Number.isFinite(value)) || isFieldPath(value) || isExpression(value);
}

/** Collects every structural problem in a raw rule set instead of stopping at the first. */
class RuleSetValidator {
    readonly problems: string[] = [];

    problem(where: string, message: string): void {
        this.problems.push(`${where}: ${message}`);
    }

    conflictPolicy(raw: unknown): ConflictPolicy {
        if (raw === undefined) return { ...DEFAULT_CONFLICT_POLICY };
        if (!isRecord(raw)) {
            this.problem('conflictPolicy', 'must be an object');
            return { ...DEFAULT_CONFLICT_POLICY };
        }
        const policy: ConflictPolicy = { ...DEFAULT_CONFLICT_POLICY, manualReviewRules: [], mergeRules: [] };
        if (raw.strategy !== undefined) {
            if (isConflictStrategy(raw.strategy)) policy.strategy = raw.strategy;
            else this.problem('conflictPolicy.strategy', `unknown strategy ${JSON.stringify(raw.strategy)}`);
        }
        for (const key of ['manualReviewRules', 'mergeRules'] as const) {
            const list = raw[key];
            if (list === undefined) continue;
            if (isStringArray(list)) policy[key] = [...list];
            else this.problem(`conflictPolicy.${key}`, 'must be a list of rule ids');
        }
        return policy;
    }

    condition(raw: unknown, where: string): Condition | null {
        if (!isRecord(raw)) {
            this.problem(where, 'must be an object');
            return null;
        }
        const { left, operator, right } = raw;
        let ok = true;
        if (!isValue(left)) {
            this.problem(`${where}.left`, 'must be a number, string, boolean or list of those');
            ok = false;
        }
        if (!isOneOf<Operator>(OPERATORS, operator)) {
            this.problem(`${where}.operator`, `must be one of ${OPERATORS.join(' ')}`);
            ok = false;
        }
        if (!isValue(right)) {
            this.problem(`${where}.right`, 'must be a number, string, boolean or list of those');
            ok = false;
        }
        if (!ok || !isValue(left) || !isValue(right) || !isOneOf<Operator>(OPERATORS, operator)) return null;
        return { left, operator, right };
    }

    private target(raw: RawRecord, where: string, type: string): string | undefined {
        if (isFieldPath(raw.target) && !raw.target.startsWith('events.')) return raw.target;
        this.problem(`${where}.target`, `${type} needs a writable field path, got ${JSON.stringify(raw.target)}`);
        return undefined;
    }

    private value(raw: RawRecord, where: string, type: string): Value | undefined {
        if (isValue(raw.value)) return raw.value;
        this.problem(`${where}.value`, `${type} needs a value`);
        return undefined;
    }

    action(raw: unknown, where: string, ruleIds: Set<string>): Action | null {
        if (!isRecord(raw)) {
            this.problem(where, 'must be an object');
            return null;
        }
        if (!isOneOf(ACTION_TYPES, raw.type)) {
            this.problem(`${where}.type`, `must be one of ${ACTION_TYPES.join(', ')}`);
            return null;
        }
        const type = raw.type;
        const before = this.problems.length;
        const action: Action = { type };
        if (raw.metadata !== undefined) {
            if (isRecord(raw.metadata)) action.metadata = { ...raw.metadata };
            else this.problem(`${where}.metadata`, 'must be an object');
        }

        switch (type) {
            case 'SET':
            case 'ADD':
            case 'RECOMMEND':
                action.target = this.target(raw, where, type);
                action.value = this.value(raw, where, type);
                break;
            case 'CLAMP':
                action.target = this.target(raw, where, type);
                if (isBound(raw.minValue)) action.minValue = raw.minValue;
                else this.problem(`${where}.minValue`, 'CLAMP needs a number, field path or expression');
                if (isBound(raw.maxValue)) action.maxValue = raw.maxValue;
                else this.problem(`${where}.maxValue`, 'CLAMP needs a number, field path or expression');
                if (typeof action.minValue === 'number' && typeof action.maxValue === 'number' && action.minValue > action.maxValue) {
                    this.problem(where, `CLAMP minValue ${action.minValue} is greater than maxValue ${action.maxValue}`);
                }
                break;
            case 'TRIGGER_RULE':
                if (typeof raw.ruleId === 'string' && ruleIds.has(raw.ruleId)) action.ruleId = raw.ruleId;
                else this.problem(`${where}.ruleId`, `TRIGGER_RULE references unknown rule ${JSON.stringify(raw.ruleId)}`);
                break;
            case 'SPAWN_EVENT':
                if (typeof raw.eventType === 'string' && EVENT_TYPE_PATTERN.test(raw.eventType)) action.eventType = raw.eventType;
                else this.problem(`${where}.eventType`, 'SPAWN_EVENT needs an event type made of letters, digits, _ or -');
                if (raw.eventSeverity !== undefined) {
                    if (isOneOf(SEVERITIES, raw.eventSeverity)) action.eventSeverity = raw.eventSeverity;
                    else this.problem(`${where}.eventSeverity`, `must be one of ${SEVERITIES.join(', ')}`);
                }
                if (raw.eventPayload !== undefined) {
                    const payload = raw.eventPayload;
                    if (isRecord(payload) && Object.values(payload).every(isValue)) {
                        action.eventPayload = {};
                        for (const [key, entry] of Object.entries(payload)) {
                            if (isValue(entry)) action.eventPayload[key] = entry;
                        }
                    } else {
                        this.problem(`${where}.eventPayload`, 'must map keys to values');
                    }
                }
                break;
            case 'LOG':
                if (typeof raw.logMessage === 'string' && raw.logMessage.length > 0) action.logMessage = raw.logMessage;
                else this.problem(`${where}.logMessage`, 'LOG needs a message');
                if (raw.logLevel !== undefined) {
                    if (isOneOf<LogLevel>(LOG_LEVELS, raw.logLevel)) action.logLevel = raw.logLevel;
                    else this.problem(`${where}.logLevel`, `must be one of ${LOG_LEVELS.join(', ')}`);
                }
                if (raw.target !== undefined) {
                    if (isFieldPath(raw.target)) action.target = raw.target;
                    else this.problem(`${where}.target`, 'must be a field path');
                }
                break;
        }
        return this.problems.length === before ? action : null;
    }

    rule(raw: unknown, index: number, ruleIds: Set<string>): Rule | null {
        const where = `rules[${index}]`;
        if (!isRecord(raw)) {
            this.problem(where, 'must be an object');
            return null;
        }
        const before = this.problems.length;
        const id = typeof raw.id === 'string' && raw.id.length > 0 ? raw.id : null;
        if (!id) this.problem(`${where}.id`, 'must be a non-empty string');
        const label = id ? `${where} (${id})` : where;

        const priority = raw.priority;
        if (typeof priority !== 'number' || !Number.isFinite(priority)) {
            this.problem(`${label}.priority`, 'must be a number');
        }
        const logic = raw.logic ?? 'AND';
        if (!isOneOf<ConditionLogic>(CONDITION_LOGICS, logic)) {
            this.problem(`${label}.logic`, 'must be AND or OR');
        }

        const conditions: Condition[] = [];
        const rawConditions = raw.conditions ?? [];
        if (Array.isArray(rawConditions)) {
            rawConditions.forEach((c, i) => {
                const condition = this.condition(c, `${label}.conditions[${i}]`);
                if (condition) conditions.push(condition);
            });
        } else {
            this.problem(`${label}.conditions`, 'must be a list');
        }

        const actions: Action[] = [];
        if (Array.isArray(raw.action) && raw.action.length > 0) {
            raw.action.forEach((a, i) => {
                const action = this.action(a, `${label}.action[${i}]`, ruleIds);
                if (action) actions.push(action);
            });
        } else {
            this.problem(`${label}.action`, 'must be a non-empty list');
        }

        const template = raw.explanationTemplate ?? '';
        if (typeof template !== 'string') this.problem(`${label}.explanationTemplate`, 'must be a string');
        const metadata = raw.metadata ?? {};
        if (!isRecord(metadata)) this.problem(`${label}.metadata`, 'must be an object');
        if (isRecord(metadata) && metadata.conflictStrategy !== undefined && !isConflictStrategy(metadata.conflictStrategy)) {
            this.problem(`${label}.metadata.conflictStrategy`, `unknown strategy ${JSON.stringify(metadata.conflictStrategy)}`);
        }

        if (this.problems.length !== before || !id || typeof priority !== 'number' || !isOneOf<ConditionLogic>(CONDITION_LOGICS, logic)
            || typeof template !== 'string' || !isRecord(metadata)) {
            return null;
        }
        return { id, priority, conditions, logic, action: actions, explanationTemplate: template, metadata: { ...metadata } };
    }
}

/**
 * Validates a parsed JSON document as a rule set. Every structural problem is
 * reported in one error; nothing partial is returned.
 */
export function parseRuleSet(raw: unknown, source = 'rule set'): RuleSet {
    const validator = new RuleSetValidator();
    if (!isRecord(raw) || !Array.isArray(raw.rules)) {
        throw new Error(`Invalid ${source}: expected an object with a "rules" list`);
    }
    const ids = raw.rules
        .map(r => (isRecord(r) && typeof r.id === 'string' ? r.id : null))
        .filter((id): id is string => id !== null);
    const seen = new Set<string>();
    for (const id of ids) {
        if (seen.has(id)) validator.problem(`rules (${id})`, 'duplicate rule id');
        seen.add(id);
    }

    const conflictPolicy = validator.conflictPolicy(raw.conflictPolicy);
    for (const listed of [...conflictPolicy.manualReviewRules, ...conflictPolicy.mergeRules]) {
        if (!seen.has(listed)) validator.problem('conflictPolicy', `references unknown rule '${listed}'`);
    }
    const rules: Rule[] = [];
    raw.rules.forEach((r, i) => {
        const rule = validator.rule(r, i, seen);
        if (rule) rules.push(rule);
    });

    if (validator.problems.length > 0) {
        throw new Error(`Invalid ${source}:\n  ${validator.problems.join('\n  ')}`);
    }
    return { rules, conflictPolicy };
}

export function summarizeRules(ruleSet: RuleSet): RuleSummary[] {
    return ruleSet.rules.map(rule => ({
        id: rule.id,
        priority: rule.priority,
        logic: rule.logic,
        conditions: rule.conditions.length,
        actions: rule.action.length,
        category: typeof rule.metadata.category === 'string' ? rule.metadata.category : null,
        tags: isStringArray(rule.metadata.tags) ? [...rule.metadata.tags] : [],
    }));
}

/** Loads (and caches) a JSON rule set from disk. */
export class RuleSetService {
    private loaded?: RuleSet;
    private readonly rulesFilePath: string;
    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;

    constructor(rulesFilePath: string, deps?: RuleSetServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        const resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.rulesFilePath = resolvePathFn(rulesFilePath);
    }

    get filePath(): string {
        return this.rulesFilePath;
    }

    async load(): Promise<RuleSet> {
        if (this.loaded) return this.loaded;
        let parsed: unknown;
        try {
            const content = await this.readFileFn(this.rulesFilePath, 'utf-8');
            parsed = JSON.parse(content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to load or parse rule file: ${this.rulesFilePath}. Original error: ${message}`);
        }
        this.loaded = parseRuleSet(parsed, `rule file ${this.rulesFilePath}`);
        dbg(`RuleSetService: Loaded ${this.loaded.rules.length} rule(s) from ${this.rulesFilePath}.`);
        return this.loaded;
    }

    async summarize(): Promise<RuleSummary[]> {
        return summarizeRules(await this.load());
    }
}
