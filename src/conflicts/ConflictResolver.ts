import { UnmergeableConflictError, describeError } from '../errors';
import { Action, ConflictPolicy, ConflictStrategy, isConflictStrategy } from '../rules/rule_types';
import { peekPath, unsetPath, writePath } from '../state/pathResolver';
import type { Value, WorldState } from '../state/state_types';
import { dbg } from '../utils';
import type { ConflictRecord, ResolutionResult } from './conflict_types';

export interface ClampRange {
    min: number;
    max: number;
}

/** One action's attempt to write a path. */
export interface WriteRequest {
    path: string;
    value: Value;
    ruleId: string;
    priority: number;
    action: Action;
    ruleMetadata: Record<string, unknown>;
    /** Bounds of a CLAMP write. */
    range?: ClampRange;
}

export interface WriteOutcome {
    /** Value held at the path after the write (undefined when left unset). */
    value: Value | undefined;
    conflict?: ConflictRecord;
}

/** Per-path bookkeeping for the current tick. */
export interface PathEntry {
    /** Value before this tick's first write. */
    base: Value | undefined;
    value: Value | undefined;
    /** Rule whose write currently holds the path. */
    holder: string | null;
    holderPriority: number;
    writers: WriteRequest[];
    /** Numeric scalar component available to MERGE. */
    scalar?: number;
    range?: ClampRange;
    mergedRules: string[];
    underReview: boolean;
}

export interface Resolution {
    strategy: ConflictStrategy;
    value: Value | undefined;
    holder: string | null;
    holderPriority: number;
    scalar?: number;
    range?: ClampRange;
    mergedRules: string[];
    resolved: boolean;
    fallbackFrom?: ConflictStrategy;
    note?: string;
}

export const DEFAULT_CONFLICT_POLICY: ConflictPolicy = {
    strategy: 'PRIORITY',
    manualReviewRules: [],
    mergeRules: [],
};

function clamp(value: number, range: ClampRange): number {
    return Math.min(Math.max(value, range.min), range.max);
}

function metadataStrategy(metadata: Record<string, unknown> | undefined): ConflictStrategy | undefined {
    const candidate = metadata?.conflictStrategy;
    return isConflictStrategy(candidate) ? candidate : undefined;
}

function scalarOf(request: WriteRequest): number | undefined {
    return request.range === undefined && typeof request.value === 'number' ? request.value : undefined;
}

function winWith(request: WriteRequest, strategy: ConflictStrategy): Resolution {
    return {
        strategy,
        value: request.value,
        holder: request.ruleId,
        holderPriority: request.priority,
        scalar: scalarOf(request),
        range: request.range,
        mergedRules: [],
        resolved: true,
    };
}

function keep(entry: PathEntry, strategy: ConflictStrategy): Resolution {
    return {
        strategy,
        value: entry.value,
        holder: entry.holder,
        holderPriority: entry.holderPriority,
        scalar: entry.scalar,
        range: entry.range,
        mergedRules: entry.mergedRules,
        resolved: true,
    };
}

function merge(entry: PathEntry, incoming: WriteRequest): Resolution {
    let range = entry.range;
    let scalar = entry.scalar;
    if (incoming.range) {
        range = range
            ? { min: Math.max(range.min, incoming.range.min), max: Math.min(range.max, incoming.range.max) }
            : incoming.range;
        if (range.min > range.max) {
            throw new UnmergeableConflictError(`Clamp ranges on '${incoming.path}' do not intersect`);
        }
    } else {
        if (typeof incoming.value !== 'number') {
            throw new UnmergeableConflictError(`Cannot merge non-numeric write ${JSON.stringify(incoming.value)} on '${incoming.path}'`);
        }
        if (scalar === undefined && entry.range === undefined) {
            throw new UnmergeableConflictError(`Cannot merge with the non-numeric write already held on '${incoming.path}'`);
        }
        scalar = scalar === undefined ? incoming.value : (scalar + incoming.value) / 2;
    }

    // Without a tracked scalar the merged range applies to the value held now.
    const source = scalar ?? entry.value;
    if (typeof source !== 'number') {
        throw new UnmergeableConflictError(`No numeric value to clamp on '${incoming.path}'`);
    }
    const value = range ? clamp(source, range) : source;
    const contributors = entry.mergedRules.length > 0 ? entry.mergedRules : entry.holder ? [entry.holder] : [];
    return {
        strategy: 'MERGE',
        value,
        holder: incoming.ruleId,
        holderPriority: Math.max(entry.holderPriority, incoming.priority),
        scalar,
        range,
        mergedRules: [...contributors.filter(r => r !== incoming.ruleId), incoming.ruleId],
        resolved: true,
    };
}

/**
 * Decides the outcome of one conflicting write. Strategies are a closed set
 * and all dispatch happens here.
 */
export function resolveConflict(strategy: ConflictStrategy, entry: PathEntry, incoming: WriteRequest): Resolution {
    switch (strategy) {
        case 'PRIORITY':
            return incoming.priority > entry.holderPriority ? winWith(incoming, strategy) : keep(entry, strategy);
        case 'LAST_WRITE_WINS':
            return winWith(incoming, strategy);
        case 'MERGE':
            try {
                return merge(entry, incoming);
            } catch (error) {
                if (!(error instanceof UnmergeableConflictError)) throw error;
                dbg(`ConflictResolver: ${error.message}; falling back to PRIORITY.`);
                return {
                    ...resolveConflict('PRIORITY', entry, incoming),
                    fallbackFrom: 'MERGE',
                    note: `${error.name}: ${error.message}`,
                };
            }
        case 'MANUAL_REVIEW':
            return {
                strategy,
                value: entry.base,
                holder: null,
                holderPriority: Number.NEGATIVE_INFINITY,
                mergedRules: [],
                resolved: false,
                note: 'Path restored to its pre-conflict value pending manual review',
            };
    }
}

/**
 * Tracks every write made during a tick and arbitrates when a second rule
 * writes a path that has already been written. Writes by the same rule to
 * the same path are sequential updates, not conflicts.
 */
export class ConflictResolver {
    private entries: Map<string, PathEntry> = new Map();
    private conflictRecords: ConflictRecord[] = [];
    private tick = 0;

    constructor(private readonly policy: ConflictPolicy = DEFAULT_CONFLICT_POLICY) {}

    beginTick(tick: number): void {
        this.tick = tick;
        this.entries = new Map();
        this.conflictRecords = [];
    }

    /** Conflict records produced so far this tick, in resolution order. */
    records(): ConflictRecord[] {
        return [...this.conflictRecords];
    }

    /**
     * Strategy precedence: the action's metadata, the rule's metadata, the
     * rule set's review/merge lists, then the policy default.
     */
    selectStrategy(entry: PathEntry, incoming: WriteRequest): ConflictStrategy {
        if (entry.underReview) return 'MANUAL_REVIEW';
        const fromMetadata = metadataStrategy(incoming.action.metadata) ?? metadataStrategy(incoming.ruleMetadata);
        if (fromMetadata) return fromMetadata;
        const involved = [...entry.writers.map(w => w.ruleId), incoming.ruleId];
        if (involved.some(id => this.policy.manualReviewRules.includes(id))) return 'MANUAL_REVIEW';
        if (this.policy.mergeRules.length > 0 && involved.every(id => this.policy.mergeRules.includes(id))) return 'MERGE';
        return this.policy.strategy;
    }

    /** Applies `request` to `state`, resolving against earlier writes this tick. */
    write(state: WorldState, request: WriteRequest): WriteOutcome {
        const entry = this.entries.get(request.path);
        if (!entry) {
            const base = peekPath(state, request.path);
            writePath(state, request.path, request.value);
            this.entries.set(request.path, {
                base,
                value: request.value,
                holder: request.ruleId,
                holderPriority: request.priority,
                writers: [request],
                scalar: scalarOf(request),
                range: request.range,
                mergedRules: [],
                underReview: false,
            });
            return { value: request.value };
        }

        if (entry.writers.every(w => w.ruleId === request.ruleId)) {
            writePath(state, request.path, request.value);
            entry.writers.push(request);
            entry.value = request.value;
            entry.scalar = scalarOf(request);
            entry.range = request.range;
            return { value: request.value };
        }

        const strategy = this.selectStrategy(entry, request);
        const resolution = resolveConflict(strategy, entry, request);
        entry.writers.push(request);
        this.apply(state, request.path, resolution.value);
        entry.value = resolution.value;
        entry.holder = resolution.holder;
        entry.holderPriority = resolution.holderPriority;
        entry.scalar = resolution.scalar;
        entry.range = resolution.range;
        entry.mergedRules = resolution.mergedRules;
        entry.underReview = entry.underReview || !resolution.resolved;

        const result: ResolutionResult = {
            finalValue: resolution.value ?? null,
            keptRule: resolution.holder,
            mergedRules: resolution.mergedRules,
        };
        if (resolution.fallbackFrom) result.fallbackFrom = resolution.fallbackFrom;
        if (resolution.note) result.note = resolution.note;

        const record: ConflictRecord = {
            id: `conflict-${this.tick}-${this.conflictRecords.length + 1}`,
            path: request.path,
            timestamp: this.tick,
            conflictingRules: entry.writers.map(w => w.ruleId).filter((id, i, all) => all.indexOf(id) === i),
            conflictingActions: entry.writers.map(w => w.action),
            resolutionStrategy: resolution.strategy,
            resolutionResult: result,
            resolved: resolution.resolved,
        };
        this.conflictRecords.push(record);
        dbg(`ConflictResolver: ${record.id} on "${record.path}" between [${record.conflictingRules.join(', ')}] -> ${record.resolutionStrategy}${record.resolved ? '' : ' (unresolved)'}.`);
        return { value: resolution.value, conflict: record };
    }

    private apply(state: WorldState, path: string, value: Value | undefined): void {
        try {
            if (value === undefined) {
                unsetPath(state, path);
            } else {
                writePath(state, path, value);
            }
        } catch (error) {
            console.error(`ConflictResolver: Failed to commit resolved value for ${path}: ${describeError(error).message}`);
            throw error;
        }
    }
}
