import { TypeMismatchError, describeError } from '../errors';
import type { ConditionEvaluation } from '../explanations/explanation_types';
import { parsePath } from '../state/pathResolver';
import type { ResolvedValue, Value, WorldState } from '../state/state_types';
import type { Condition, ConditionLogic, Operator } from './rule_types';
import { resolveOperand } from './valueExpression';

export interface ConditionSetResult {
    triggered: boolean;
    evaluations: ConditionEvaluation[];
    /** Index of the first condition that settled the outcome under short-circuit rules. */
    decidedBy: number | null;
    /** True when any condition failed with an error; the rule must not fire. */
    failed: boolean;
}

/** Renders a value the way it appears in explanation traces. */
export function formatValue(value: ResolvedValue): string {
    if (value === null) return 'absent';
    if (Array.isArray(value)) return `[${value.map(v => formatValue(v)).join(', ')}]`;
    if (typeof value === 'string') return `'${value}'`;
    return String(value);
}

export function formatOperand(operand: Value): string {
    return Array.isArray(operand) ? formatValue(operand) : String(operand);
}

/** Numbers pass through; numeric strings such as `"7"` are read as numbers. */
function requireNumber(value: ResolvedValue, side: string, operator: Operator): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        if (Number.isFinite(parsed)) return parsed;
    }
    throw new TypeMismatchError(`Operator '${operator}' needs a number on the ${side} side, got ${formatValue(value)}`);
}

/**
 * Typed equality: no cross-type coercion, sequences compare element-wise and
 * the absent marker only equals itself or `false`.
 */
export function valuesEqual(left: ResolvedValue, right: ResolvedValue): boolean {
    if (left === null || right === null) {
        const other = left === null ? right : left;
        return other === null || other === false;
    }
    if (Array.isArray(left) || Array.isArray(right)) {
        if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
            return false;
        }
        const items = right;
        return left.every((item, i) => item === items[i]);
    }
    return typeof left === typeof right && left === right;
}

export function compare(left: ResolvedValue, operator: Operator, right: ResolvedValue): boolean {
    switch (operator) {
        case '<':
            return requireNumber(left, 'left', operator) < requireNumber(right, 'right', operator);
        case '>':
            return requireNumber(left, 'left', operator) > requireNumber(right, 'right', operator);
        case '<=':
            return requireNumber(left, 'left', operator) <= requireNumber(right, 'right', operator);
        case '>=':
            return requireNumber(left, 'left', operator) >= requireNumber(right, 'right', operator);
        case '==':
            return valuesEqual(left, right);
        case '!=':
            return !valuesEqual(left, right);
        case 'in':
            if (!Array.isArray(right)) {
                throw new TypeMismatchError(`Operator 'in' needs a sequence on the right side, got ${formatValue(right)}`);
            }
            return right.some(item => valuesEqual(left, item));
    }
}

function eventSourcesOf(condition: Condition, state: WorldState): string[] {
    const sources: string[] = [];
    for (const side of [condition.left, condition.right]) {
        if (typeof side !== 'string') continue;
        const parsed = parsePath(side);
        if (parsed?.container === 'events') {
            const event = state.events[parsed.eventType];
            if (event && !sources.includes(event.sourceRule)) {
                sources.push(event.sourceRule);
            }
        }
    }
    return sources;
}

/**
 * Evaluates a single condition. Never throws: resolution and type errors are
 * captured on the returned evaluation with `result: false`.
 */
export function evaluateCondition(condition: Condition, state: WorldState): ConditionEvaluation {
    const left = formatOperand(condition.left);
    const right = formatOperand(condition.right);
    const eventSources = eventSourcesOf(condition, state);
    let leftValue: ResolvedValue = null;
    let rightValue: ResolvedValue = null;
    try {
        leftValue = resolveOperand(condition.left, state);
        rightValue = resolveOperand(condition.right, state);
        const result = compare(leftValue, condition.operator, rightValue);
        return {
            condition,
            leftValue,
            rightValue,
            result,
            message: `${left} [${formatValue(leftValue)}] ${condition.operator} ${right} [${formatValue(rightValue)}] -> ${result}`,
            eventSources,
        };
    } catch (error) {
        const recorded = describeError(error);
        return {
            condition,
            leftValue,
            rightValue,
            result: false,
            message: `${left} ${condition.operator} ${right} -> error: ${recorded.message}`,
            eventSources,
            error: recorded,
        };
    }
}

/**
 * Evaluates every condition (so the explanation covers the whole list), then
 * applies AND/OR short-circuit policy to decide the outcome. An empty list is
 * vacuously true.
 */
export function evaluateAll(conditions: Condition[], logic: ConditionLogic, state: WorldState): ConditionSetResult {
    const evaluations = conditions.map(c => evaluateCondition(c, state));
    const failed = evaluations.some(e => e.error !== undefined);
    const settling = logic === 'AND' ? false : true;
    const index = evaluations.findIndex(e => e.result === settling);
    const decidedBy = index === -1 ? null : index;
    const triggered = !failed && (logic === 'AND' ? decidedBy === null : decidedBy !== null || conditions.length === 0);
    return { triggered, evaluations, decidedBy, failed };
}
