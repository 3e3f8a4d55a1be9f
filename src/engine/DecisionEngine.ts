import { ConflictResolver, DEFAULT_CONFLICT_POLICY } from '../conflicts/ConflictResolver';
import type { ConflictRecord } from '../conflicts/conflict_types';
import { RuleChainOverflowError, describeError } from '../errors';
import { EventBus, EventLifetime } from '../events/EventBus';
import { ExplanationBuilder } from '../explanations/ExplanationBuilder';
import { InputTranslator, SimulationInput, describeInput, writeInput } from '../inputs/InputTranslator';
import { ActionExecutor } from '../rules/ActionExecutor';
import { formatValue, evaluateAll } from '../rules/conditionEvaluator';
import type { ConflictStrategy, Rule, RuleSet } from '../rules/rule_types';
import { writePath } from '../state/pathResolver';
import { ReplayCursor, StateStore } from '../state/StateStore';
import type {
    ChainOverflowDiagnostic,
    InputFailure,
    StateSnapshot,
    SystemState,
    TickStats,
    Value,
    WorldState,
} from '../state/state_types';
import { deepCopy, dbg } from '../utils';

export const DEFAULT_MAX_CHAIN_DEPTH = 32;

export interface DecisionEngineOptions {
    /** Deepest TRIGGER_RULE chain allowed in one tick; base-queue rules are depth 0. */
    maxChainDepth?: number;
    eventLifetime?: EventLifetime;
    /** Overrides the rule set's default conflict strategy. */
    conflictStrategy?: ConflictStrategy;
    inputTranslator?: InputTranslator;
}

interface QueueEntry {
    ruleId: string;
    triggeredBy: string | null;
    depth: number;
    /** Rule ids from the chain root to this entry. */
    chain: string[];
}

/** Mutable bookkeeping for the tick in progress. */
interface TickContext {
    tick: number;
    state: WorldState;
    queue: QueueEntry[];
    evaluated: Set<string>;
    builders: Map<string, ExplanationBuilder>;
    order: ExplanationBuilder[];
    chainHalted: boolean;
    chainOverflow: ChainOverflowDiagnostic | null;
    actionsApplied: number;
    actionsFailed: number;
}

function summarizeConflict(record: ConflictRecord): string {
    const outcome = record.resolved ? '' : ' (unresolved, awaiting manual review)';
    const fallback = record.resolutionResult.fallbackFrom ? ` after ${record.resolutionResult.fallbackFrom} failed` : '';
    return `Conflict ${record.id} on ${record.path}: ${record.resolutionStrategy}${fallback} -> ${formatValue(record.resolutionResult.finalValue)}${outcome}`;
}

/**
 * Runs the simulation one tick at a time: applies buffered inputs, evaluates
 * every rule in priority order (with chained rules jumping the queue), routes
 * state writes through conflict resolution and commits an explained snapshot.
 *
 * Each engine owns its state, event bus and history; engines never share them.
 */
export class DecisionEngine {
    private readonly store: StateStore;
    private readonly ruleList: Rule[];
    private readonly ruleIndex: Map<string, Rule>;
    private readonly eventBus: EventBus;
    private readonly resolver: ConflictResolver;
    private readonly executor: ActionExecutor;
    private readonly translator: InputTranslator;
    private readonly maxChainDepth: number;
    private pending: SimulationInput[] = [];

    constructor(initial: WorldState, ruleSet: RuleSet | Rule[], options: DecisionEngineOptions = {}) {
        const { rules, conflictPolicy } = Array.isArray(ruleSet)
            ? { rules: ruleSet, conflictPolicy: DEFAULT_CONFLICT_POLICY }
            : ruleSet;
        this.maxChainDepth = options.maxChainDepth ?? DEFAULT_MAX_CHAIN_DEPTH;
        if (!Number.isInteger(this.maxChainDepth) || this.maxChainDepth < 0) {
            throw new Error(`DecisionEngine: maxChainDepth must be a non-negative integer, got ${this.maxChainDepth}.`);
        }

        this.ruleIndex = new Map();
        for (const rule of rules) {
            if (this.ruleIndex.has(rule.id)) {
                throw new Error(`DecisionEngine: Duplicate rule id '${rule.id}'.`);
            }
            this.ruleIndex.set(rule.id, rule);
        }
        // Stable sort keeps declaration order among equal priorities.
        this.ruleList = [...rules].sort((a, b) => b.priority - a.priority);

        this.store = StateStore.fromWorld(initial);
        this.eventBus = new EventBus(options.eventLifetime ?? 'tick');
        this.eventBus.load(deepCopy(initial.events));
        this.resolver = new ConflictResolver({
            ...conflictPolicy,
            strategy: options.conflictStrategy ?? conflictPolicy.strategy,
        });
        this.executor = new ActionExecutor({
            resolver: this.resolver,
            eventBus: this.eventBus,
            ruleExists: (ruleId) => this.ruleIndex.has(ruleId),
        });
        this.translator = options.inputTranslator ?? new InputTranslator();
        dbg(`DecisionEngine: Loaded ${this.ruleList.length} rule(s), max chain depth ${this.maxChainDepth}.`);
    }

    /** Rules in evaluation order (priority descending, ties by declaration order). */
    rules(): readonly Rule[] {
        return this.ruleList;
    }

    /** Buffers an input; it is applied at the start of the next tick. */
    submitInput(input: SimulationInput): void {
        this.pending.push(deepCopy(input));
    }

    submitWrite(path: string, value: Value): void {
        this.submitInput(writeInput(path, value));
    }

    pendingInputs(): number {
        return this.pending.length;
    }

    /**
     * Removes an event so later ticks no longer see it. Only meaningful with
     * the 'persistent' event lifetime; tick-scoped events vanish on their own.
     */
    consumeEvent(eventType: string): boolean {
        const consumed = this.eventBus.consume(eventType);
        if (consumed) dbg(`DecisionEngine: Consumed event "${eventType}".`);
        return consumed;
    }

    /** The last committed state (frozen). */
    state(): Readonly<WorldState> {
        return this.store.current();
    }

    systemState(): SystemState {
        return this.store.toSystemState();
    }

    history(): readonly StateSnapshot[] {
        return this.store.history();
    }

    snapshot(tick: number): StateSnapshot | undefined {
        return this.store.getSnapshot(tick);
    }

    replay(): ReplayCursor {
        return this.store.replay();
    }

    /** Runs `count` ticks and returns their snapshots. */
    run(count: number): StateSnapshot[] {
        const snapshots: StateSnapshot[] = [];
        for (let i = 0; i < count; i++) {
            snapshots.push(this.tick());
        }
        return snapshots;
    }

    /** Runs one full tick and returns its committed snapshot. */
    tick(): StateSnapshot {
        const working = this.store.workingCopy();
        const tick = working.timeStep;
        dbg(`DecisionEngine: Starting tick ${tick}.`);

        const { state, applied, failures } = this.applyInputs(working);

        this.eventBus.beginTick(tick);
        state.events = this.eventBus.toRecord();
        this.resolver.beginTick(tick);

        const ctx: TickContext = {
            tick,
            state,
            queue: this.ruleList.map(rule => ({ ruleId: rule.id, triggeredBy: null, depth: 0, chain: [rule.id] })),
            evaluated: new Set(),
            builders: new Map(),
            order: [],
            chainHalted: false,
            chainOverflow: null,
            actionsApplied: 0,
            actionsFailed: 0,
        };

        for (let entry = ctx.queue.shift(); entry !== undefined; entry = ctx.queue.shift()) {
            this.process(entry, ctx);
        }

        state.events = this.eventBus.toRecord();
        state.timeStep = tick + 1;

        const explanations = ctx.order.map(builder => builder.build());
        const conflicts = this.resolver.records();
        const stats: TickStats = {
            rulesEvaluated: explanations.length,
            rulesTriggered: explanations.filter(e => e.triggered).length,
            actionsApplied: ctx.actionsApplied,
            actionsFailed: ctx.actionsFailed,
            conflicts: conflicts.length,
            eventsSpawned: this.eventBus.spawned().length,
        };
        const snapshot = this.store.commit(state, {
            tick,
            explanations,
            conflicts,
            inputsApplied: applied,
            inputFailures: failures,
            chainOverflow: ctx.chainOverflow,
            stats,
        });
        dbg(`DecisionEngine: Tick ${tick} done: ${stats.rulesTriggered}/${stats.rulesEvaluated} rule(s) triggered, ${stats.conflicts} conflict(s).`);
        return snapshot;
    }

    /**
     * Applies the buffered inputs in submission order. Each input is atomic:
     * if any of its writes fails, none of them land and the failure is reported.
     */
    private applyInputs(working: WorldState): { state: WorldState; applied: string[]; failures: InputFailure[] } {
        const inputs = this.pending;
        this.pending = [];
        let state = working;
        const applied: string[] = [];
        const failures: InputFailure[] = [];
        for (const input of inputs) {
            const label = describeInput(input);
            try {
                const scratch = deepCopy(state);
                for (const write of this.translator.translate(input, scratch)) {
                    writePath(scratch, write.path, write.value);
                }
                state = scratch;
                applied.push(label);
            } catch (error) {
                const recorded = describeError(error);
                console.warn(`DecisionEngine: Input ${label} rejected: ${recorded.message}`);
                failures.push({ input: label, error: `${recorded.name}: ${recorded.message}` });
            }
        }
        return { state, applied, failures };
    }

    private process(entry: QueueEntry, ctx: TickContext): void {
        if (ctx.evaluated.has(entry.ruleId)) {
            if (entry.triggeredBy !== null) {
                ctx.builders.get(entry.triggeredBy)?.addSideEffect(`Re-trigger of '${entry.ruleId}' ignored: already evaluated this tick`);
            }
            return;
        }
        const rule = this.ruleIndex.get(entry.ruleId);
        if (!rule) return;

        ctx.evaluated.add(rule.id);
        const builder = new ExplanationBuilder(rule, ctx.tick, entry.triggeredBy);
        ctx.builders.set(rule.id, builder);
        ctx.order.push(builder);

        const conditions = evaluateAll(rule.conditions, rule.logic, ctx.state);
        builder.recordConditions(conditions);
        if (!conditions.triggered) return;

        dbg(`DecisionEngine: Rule "${rule.id}" triggered${entry.triggeredBy ? ` by "${entry.triggeredBy}"` : ''}.`);
        const scheduled: QueueEntry[] = [];
        for (const action of rule.action) {
            try {
                const application = this.executor.execute(action, { rule, state: ctx.state });
                if (application.triggerRequest) {
                    const next = this.schedule(application.triggerRequest, entry, scheduled, ctx);
                    if (next) {
                        scheduled.push(next);
                    } else {
                        delete application.triggerRequest;
                        application.message += ' (ignored)';
                    }
                }
                builder.recordAction(application);
                ctx.actionsApplied++;
                if (application.conflictId) {
                    this.attachConflict(application.conflictId, ctx);
                }
            } catch (error) {
                builder.recordAction(ActionExecutor.failure(action, error));
                builder.recordError(error);
                ctx.actionsFailed++;
                dbg(`DecisionEngine: Rule "${rule.id}" stopped at ${action.type}: ${describeError(error).message}`);
                break;
            }
        }
        if (!ctx.chainHalted) ctx.queue.unshift(...scheduled);
    }

    /**
     * Decides what a TRIGGER_RULE request turns into. Returns the queue entry
     * to push, or null when the request is a recorded no-op. Throws
     * RuleChainOverflowError when the chain would get too deep.
     */
    private schedule(target: string, from: QueueEntry, scheduled: QueueEntry[], ctx: TickContext): QueueEntry | null {
        const builder = ctx.builders.get(from.ruleId);
        if (ctx.chainHalted) {
            builder?.addSideEffect(`Trigger of '${target}' ignored: chaining halted for this tick`);
            return null;
        }
        if (ctx.evaluated.has(target) || scheduled.some(e => e.ruleId === target)) {
            builder?.addSideEffect(`Re-trigger of '${target}' ignored: already evaluated this tick`);
            return null;
        }
        const depth = from.depth + 1;
        const chain = [...from.chain, target];
        if (depth > this.maxChainDepth) {
            ctx.chainHalted = true;
            ctx.chainOverflow = { ruleId: target, triggeredBy: from.ruleId, depth, maxDepth: this.maxChainDepth, chain };
            ctx.queue = ctx.queue.filter(e => e.triggeredBy === null);
            console.warn(`DecisionEngine: Rule chain overflow in tick ${ctx.tick}: ${chain.join(' -> ')}`);
            throw new RuleChainOverflowError(target, depth, this.maxChainDepth);
        }
        return { ruleId: target, triggeredBy: from.ruleId, depth, chain };
    }

    private attachConflict(conflictId: string, ctx: TickContext): void {
        const record = this.resolver.records().find(r => r.id === conflictId);
        if (!record) return;
        const summary = summarizeConflict(record);
        for (const ruleId of record.conflictingRules) {
            ctx.builders.get(ruleId)?.recordConflict(conflictId, summary);
        }
    }
}
