/**
 * Error taxonomy for the decision engine.
 *
 * Errors raised while evaluating or applying a single rule are caught by the
 * engine and recorded on that rule's Explanation; they never escape a tick.
 */

export type SimulationErrorCode =
    | 'UNKNOWN_PATH'
    | 'UNKNOWN_AGENT'
    | 'TYPE_MISMATCH'
    | 'INVALID_ACTION'
    | 'UNMERGEABLE_CONFLICT'
    | 'RULE_CHAIN_OVERFLOW';

export abstract class SimulationError extends Error {
    abstract readonly code: SimulationErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class UnknownPathError extends SimulationError {
    readonly code = 'UNKNOWN_PATH';

    constructor(readonly path: string, detail?: string) {
        super(detail ? `Unknown path '${path}': ${detail}` : `Unknown path '${path}'`);
    }
}

export class UnknownAgentError extends SimulationError {
    readonly code = 'UNKNOWN_AGENT';

    constructor(readonly agentId: string) {
        super(`Unknown agent '${agentId}' (agents must be declared in the initial state)`);
    }
}

export class TypeMismatchError extends SimulationError {
    readonly code = 'TYPE_MISMATCH';
}

export class InvalidActionError extends SimulationError {
    readonly code = 'INVALID_ACTION';
}

export class UnmergeableConflictError extends SimulationError {
    readonly code = 'UNMERGEABLE_CONFLICT';
}

export class RuleChainOverflowError extends SimulationError {
    readonly code = 'RULE_CHAIN_OVERFLOW';

    constructor(readonly ruleId: string, readonly depth: number, readonly maxDepth: number) {
        super(`Rule chain overflow: triggering '${ruleId}' would reach depth ${depth} (max ${maxDepth})`);
    }
}

/** Flattens any thrown value into the shape recorded on explanations. */
export function describeError(error: unknown): { name: string; code?: SimulationErrorCode; message: string } {
    if (error instanceof SimulationError) {
        return { name: error.name, code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { name: 'Error', message: String(error) };
}
