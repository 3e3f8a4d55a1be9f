import { ClampRange, ConflictResolver, WriteOutcome } from '../conflicts/ConflictResolver';
import { InvalidActionError, TypeMismatchError, describeError } from '../errors';
import { EventBus } from '../events/EventBus';
import type { ActionApplication, LogEntry } from '../explanations/explanation_types';
import { peekPath, resolvePath } from '../state/pathResolver';
import type { ResolvedValue, Value, WorldState } from '../state/state_types';
import { dbg } from '../utils';
import { formatValue } from './conditionEvaluator';
import { Action, LOG_LEVELS, LogLevel, Rule } from './rule_types';
import { resolveOperand } from './valueExpression';

/** Where the executor is running: the rule being applied and the working state. */
export interface ExecutionContext {
    rule: Rule;
    state: WorldState;
}

export interface ActionExecutorDependencies {
    resolver: ConflictResolver;
    eventBus: EventBus;
    /** Whether a rule id exists in the loaded rule set, for TRIGGER_RULE validation. */
    ruleExists: (ruleId: string) => boolean;
}

function requireField<T>(value: T | undefined, action: Action, field: string): T {
    if (value === undefined || value === null || value === '') {
        throw new InvalidActionError(`${action.type} action requires '${field}'`);
    }
    return value;
}

/** Like `requireField`, but an empty string is a legitimate value to write. */
function requireValue<T>(value: T | undefined, action: Action): T {
    if (value === undefined || value === null) {
        throw new InvalidActionError(`${action.type} action requires 'value'`);
    }
    return value;
}

function requireNumeric(value: ResolvedValue, what: string): number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new TypeMismatchError(`${what} must be numeric, got ${formatValue(value)}`);
    }
    return value;
}

function requirePresent(value: ResolvedValue, what: string): Value {
    if (value === null) {
        throw new InvalidActionError(`${what} resolved to an absent value`);
    }
    return value;
}

function current(state: WorldState, target: string): ResolvedValue {
    return peekPath(state, target) ?? null;
}

/**
 * Applies one action at a time to the working state. State writes go through
 * the ConflictResolver so that competing writes within a tick are arbitrated.
 */
export class ActionExecutor {
    constructor(private readonly deps: ActionExecutorDependencies) {}

    /**
     * Applies `action` and returns what it did. Throws on malformed actions
     * or type errors; the caller records the failure and stops the rule.
     */
    execute(action: Action, ctx: ExecutionContext): ActionApplication {
        switch (action.type) {
            case 'SET':
                return this.set(action, ctx);
            case 'ADD':
                return this.add(action, ctx);
            case 'CLAMP':
                return this.clamp(action, ctx);
            case 'RECOMMEND':
                return this.recommend(action, ctx);
            case 'TRIGGER_RULE':
                return this.triggerRule(action);
            case 'SPAWN_EVENT':
                return this.spawnEvent(action, ctx);
            case 'LOG':
                return this.log(action, ctx);
        }
    }

    /** Record for an action that threw. */
    static failure(action: Action, error: unknown, before: ResolvedValue = null): ActionApplication {
        const recorded = describeError(error);
        return {
            action,
            before,
            after: before,
            success: false,
            message: `${action.type} failed: ${recorded.name}: ${recorded.message}`,
        };
    }

    private commit(ctx: ExecutionContext, action: Action, target: string, value: Value, range?: ClampRange): WriteOutcome {
        return this.deps.resolver.write(ctx.state, {
            path: target,
            value,
            ruleId: ctx.rule.id,
            priority: ctx.rule.priority,
            action,
            ruleMetadata: ctx.rule.metadata,
            range,
        });
    }

    private written(action: Action, before: ResolvedValue, outcome: WriteOutcome, message: string): ActionApplication {
        const application: ActionApplication = {
            action,
            before,
            after: outcome.value ?? null,
            success: true,
            message,
        };
        if (outcome.conflict) {
            application.conflictId = outcome.conflict.id;
            application.message += ` (conflict ${outcome.conflict.id}: ${outcome.conflict.resolutionStrategy}, final ${formatValue(outcome.value ?? null)})`;
        }
        return application;
    }

    private set(action: Action, ctx: ExecutionContext): ActionApplication {
        const target = requireField(action.target, action, 'target');
        const raw = requireValue(action.value, action);
        const before = current(ctx.state, target);
        const value = requirePresent(resolveOperand(raw, ctx.state), `SET value for ${target}`);
        const outcome = this.commit(ctx, action, target, value);
        return this.written(action, before, outcome, `SET ${target}: ${formatValue(before)} -> ${formatValue(value)}`);
    }

    private add(action: Action, ctx: ExecutionContext): ActionApplication {
        const target = requireField(action.target, action, 'target');
        const raw = requireValue(action.value, action);
        const before = current(ctx.state, target);
        const delta = requireNumeric(resolveOperand(raw, ctx.state), `ADD value for ${target}`);
        const base = before === null ? 0 : requireNumeric(before, `Current value of ${target}`);
        const value = base + delta;
        const outcome = this.commit(ctx, action, target, value);
        return this.written(action, before, outcome, `ADD ${delta} to ${target}: ${formatValue(before)} -> ${value}`);
    }

    private clamp(action: Action, ctx: ExecutionContext): ActionApplication {
        const target = requireField(action.target, action, 'target');
        const min = requireNumeric(resolveOperand(requireField(action.minValue, action, 'minValue'), ctx.state), `CLAMP minValue for ${target}`);
        const max = requireNumeric(resolveOperand(requireField(action.maxValue, action, 'maxValue'), ctx.state), `CLAMP maxValue for ${target}`);
        if (min > max) {
            throw new InvalidActionError(`CLAMP on ${target} has minValue ${min} greater than maxValue ${max}`);
        }
        const before = current(ctx.state, target);
        const value = Math.min(Math.max(requireNumeric(before, `Current value of ${target}`), min), max);
        const outcome = this.commit(ctx, action, target, value, { min, max });
        return this.written(action, before, outcome, `CLAMP ${target}: ${formatValue(before)} -> ${value} (min=${min}, max=${max})`);
    }

    private recommend(action: Action, ctx: ExecutionContext): ActionApplication {
        const target = requireField(action.target, action, 'target');
        const raw = requireValue(action.value, action);
        const before = current(ctx.state, target);
        const value = resolveOperand(raw, ctx.state);
        return {
            action,
            before,
            after: before,
            success: true,
            message: `RECOMMEND ${target} = ${formatValue(value)} (current: ${formatValue(before)}, not enforced)`,
            recommendation: { target, value, current: before },
        };
    }

    private triggerRule(action: Action): ActionApplication {
        const ruleId = requireField(action.ruleId, action, 'ruleId');
        if (!this.deps.ruleExists(ruleId)) {
            throw new InvalidActionError(`TRIGGER_RULE references unknown rule '${ruleId}'`);
        }
        return {
            action,
            before: null,
            after: null,
            success: true,
            message: `TRIGGER_RULE: scheduling '${ruleId}'`,
            triggerRequest: ruleId,
        };
    }

    private spawnEvent(action: Action, ctx: ExecutionContext): ActionApplication {
        const eventType = requireField(action.eventType, action, 'eventType');
        const payload: Record<string, Value> = {};
        for (const [key, raw] of Object.entries(action.eventPayload ?? {})) {
            const resolved = resolveOperand(raw, ctx.state);
            if (resolved !== null) payload[key] = resolved;
        }
        const before: ResolvedValue = ctx.state.events[eventType] ? true : null;
        const event = this.deps.eventBus.spawn({
            eventType,
            sourceRule: ctx.rule.id,
            payload,
            severity: action.eventSeverity,
        });
        ctx.state.events[eventType] = event;
        return {
            action,
            before,
            after: true,
            success: true,
            message: `SPAWN_EVENT: ${eventType} activated (${event.severity})`,
            event,
        };
    }

    private log(action: Action, ctx: ExecutionContext): ActionApplication {
        const message = requireField(action.logMessage, action, 'logMessage');
        const level: LogLevel = action.logLevel ?? 'info';
        if (!LOG_LEVELS.includes(level)) {
            throw new InvalidActionError(`LOG action has unknown level '${String(level)}'`);
        }
        const entry: LogEntry = { level, message };
        if (action.target) {
            entry.target = action.target;
            entry.targetValue = resolvePath(ctx.state, action.target);
        }
        const line = `[${ctx.rule.id}] ${message}`;
        switch (level) {
            case 'error':
                console.error(line);
                break;
            case 'warning':
                console.warn(line);
                break;
            default:
                dbg(line);
        }
        const suffix = entry.target ? ` (${entry.target} = ${formatValue(entry.targetValue ?? null)})` : '';
        return {
            action,
            before: null,
            after: null,
            success: true,
            message: `LOG [${level.toUpperCase()}]: ${message}${suffix}`,
            log: entry,
        };
    }
}
