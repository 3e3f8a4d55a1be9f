import { describeError } from '../errors';
import { ConditionSetResult, formatOperand, formatValue } from '../rules/conditionEvaluator';
import type { Rule } from '../rules/rule_types';
import { isFieldPath } from '../state/pathResolver';
import type { ResolvedValue } from '../state/state_types';
import type {
    ActionApplication,
    CauseSummary,
    ConditionEvaluation,
    EducationalExplanation,
    EffectSummary,
    Explanation,
    RecordedError,
} from './explanation_types';

const PLACEHOLDER_PATTERN = /\{\{\s*([^{}]+?)\s*\}\}/g;

const MUTATING_ACTIONS = new Set(['SET', 'ADD', 'CLAMP']);

export interface TemplateExpansion {
    message: string;
    unresolved: string[];
}

/** Formats a value for human-readable messages: whole numbers without decimals, others to two places. */
export function formatTemplateValue(value: ResolvedValue): string {
    if (value === null) return 'absent';
    if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(2);
    if (Array.isArray(value)) return value.map(v => formatTemplateValue(v)).join(', ');
    return String(value);
}

/**
 * Substitutes `{{name}}` placeholders from `values`. Unknown names are left
 * verbatim and reported in `unresolved`.
 */
export function expandTemplate(template: string, values: Record<string, ResolvedValue>): TemplateExpansion {
    const unresolved: string[] = [];
    const message = template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
        if (Object.prototype.hasOwnProperty.call(values, name)) {
            return formatTemplateValue(values[name]);
        }
        if (!unresolved.includes(name)) unresolved.push(name);
        return placeholder;
    });
    return { message, unresolved };
}

/**
 * Accumulates the causal record of one rule evaluation while the engine
 * processes it. Conflicts discovered later in the tick can still be attached
 * until `build()` is called at commit time.
 */
export class ExplanationBuilder {
    private evaluations: ConditionEvaluation[] = [];
    private decidedBy: number | null = null;
    private triggered = false;
    private conditionsFailed = false;
    private applications: ActionApplication[] = [];
    private sideEffects: string[] = [];
    private eventsGenerated: string[] = [];
    private conflicts: string[] = [];
    private triggeredRules: string[] = [];
    private errors: RecordedError[] = [];

    constructor(
        readonly rule: Rule,
        readonly timestamp: number,
        readonly triggeredBy: string | null
    ) {}

    get ruleId(): string {
        return this.rule.id;
    }

    recordConditions(result: ConditionSetResult): void {
        this.evaluations = result.evaluations;
        this.decidedBy = result.decidedBy;
        this.triggered = result.triggered;
        this.conditionsFailed = result.failed;
        for (const evaluation of result.evaluations) {
            if (evaluation.error) {
                this.errors.push(evaluation.error);
                this.sideEffects.push(`${evaluation.error.name}: ${evaluation.error.message}`);
            }
        }
    }

    recordAction(application: ActionApplication): void {
        this.applications.push(application);
        if (!application.success) return;
        if (application.triggerRequest) {
            this.triggeredRules.push(application.triggerRequest);
            this.sideEffects.push(`Triggered rule: ${application.triggerRequest}`);
        }
        if (application.event) {
            this.eventsGenerated.push(application.event.id);
            this.sideEffects.push(`Spawned event: ${application.event.eventType} (${application.event.id})`);
        }
        if (application.log) {
            this.sideEffects.push(`[${application.log.level.toUpperCase()}] ${application.log.message}`);
        }
    }

    /** Records a failure that aborted this rule (or a tick-level failure attributed to it). */
    recordError(error: unknown): void {
        const recorded = describeError(error);
        this.errors.push(recorded);
        this.sideEffects.push(`${recorded.name}: ${recorded.message}`);
    }

    recordConflict(conflictId: string, summary: string): void {
        if (this.conflicts.includes(conflictId)) return;
        this.conflicts.push(conflictId);
        this.sideEffects.push(summary);
    }

    addSideEffect(sideEffect: string): void {
        this.sideEffects.push(sideEffect);
    }

    private cause(): CauseSummary {
        const values: Record<string, ResolvedValue> = {};
        for (const evaluation of this.evaluations) {
            if (isFieldPath(evaluation.condition.left)) values[evaluation.condition.left] = evaluation.leftValue;
            if (isFieldPath(evaluation.condition.right)) values[evaluation.condition.right] = evaluation.rightValue;
        }
        return {
            logic: this.rule.logic,
            conditionsMet: this.evaluations
                .filter(e => e.result)
                .map(e => ({
                    left: formatOperand(e.condition.left),
                    operator: e.condition.operator,
                    right: formatOperand(e.condition.right),
                    leftValue: e.leftValue,
                    rightValue: e.rightValue,
                })),
            triggeredBy: this.triggeredBy,
            values,
        };
    }

    private effect(): EffectSummary {
        const effect: EffectSummary = { changes: [], recommendations: [], eventsSpawned: [], rulesTriggered: [...this.triggeredRules], values: {} };
        for (const application of this.applications) {
            if (!application.success) continue;
            const target = application.action.target;
            if (target && MUTATING_ACTIONS.has(application.action.type)) {
                effect.changes.push({ type: application.action.type, target, from: application.before, to: application.after });
                effect.values[target] = application.after;
            }
            if (application.recommendation) {
                effect.recommendations.push(application.recommendation);
                effect.values[application.recommendation.target] = application.recommendation.value;
            }
            if (application.event) {
                effect.eventsSpawned.push(application.event.eventType);
            }
        }
        return effect;
    }

    private templateValues(cause: CauseSummary, effect: EffectSummary): Record<string, ResolvedValue> {
        const values: Record<string, ResolvedValue> = {
            rule_id: this.rule.id,
            priority: this.rule.priority,
            timestamp: this.timestamp,
            triggered_by: this.triggeredBy,
        };
        for (const [path, value] of Object.entries(cause.values)) {
            values[path] = value;
            values[`cause.${path}`] = value;
        }
        for (const [path, value] of Object.entries(effect.values)) {
            values[path] = value;
            values[`effect.${path}`] = value;
        }
        return values;
    }

    private summary(): string {
        if (this.conditionsFailed) {
            return `Rule ${this.rule.id} not triggered: condition evaluation failed`;
        }
        const met = this.evaluations.filter(e => e.result).length;
        return `Rule ${this.rule.id} not triggered: ${met}/${this.evaluations.length} conditions met (${this.rule.logic})`;
    }

    build(): Explanation {
        const cause = this.cause();
        const effect = this.effect();
        const sideEffects = [...this.sideEffects];
        let message: string;
        if (!this.triggered) {
            message = this.summary();
        } else if (this.rule.explanationTemplate) {
            const expansion = expandTemplate(this.rule.explanationTemplate, this.templateValues(cause, effect));
            message = expansion.message;
            for (const name of expansion.unresolved) {
                sideEffects.push(`Unresolved template placeholder: {{${name}}}`);
            }
        } else {
            message = `Rule ${this.rule.id} triggered: ${this.applications.filter(a => a.success).length} action(s) applied`;
        }

        return {
            ruleId: this.rule.id,
            priority: this.rule.priority,
            triggered: this.triggered,
            timestamp: this.timestamp,
            conditionsEvaluated: this.evaluations,
            logicUsed: this.rule.logic,
            decidedBy: this.decidedBy,
            actionsApplied: [...this.applications],
            sideEffects,
            eventsGenerated: [...this.eventsGenerated],
            conflictsEncountered: [...this.conflicts],
            triggeredBy: this.triggeredBy,
            triggeredRules: [...this.triggeredRules],
            message,
            cause,
            effect,
            errors: [...this.errors],
        };
    }
}

/** Reshapes an explanation into the when/why/what-happened view shown to exhibit visitors. */
export function toEducationalFormat(explanation: Explanation): EducationalExplanation {
    return {
        ruleId: explanation.ruleId,
        priority: explanation.priority,
        triggered: explanation.triggered,
        when: `Time step ${explanation.timestamp}`,
        why: {
            conditions: explanation.conditionsEvaluated.map(ce => ({
                condition: `${formatOperand(ce.condition.left)} ${ce.condition.operator} ${formatOperand(ce.condition.right)}`,
                actualValues: `${formatValue(ce.leftValue)} vs ${formatValue(ce.rightValue)}`,
                result: ce.result,
                explanation: ce.message,
            })),
            logic: explanation.logicUsed,
        },
        whatHappened: {
            actions: explanation.actionsApplied.map(aa => ({
                action: aa.action.type,
                target: aa.action.target ?? aa.action.ruleId ?? aa.action.eventType ?? '',
                changedFrom: aa.before,
                changedTo: aa.after,
                explanation: aa.message,
            })),
        },
        sideEffects: explanation.sideEffects,
        causalChain: {
            triggeredBy: explanation.triggeredBy,
            triggeredRules: explanation.triggeredRules,
            events: explanation.eventsGenerated,
        },
        message: explanation.message,
    };
}
