import type { Action, ConflictStrategy } from '../rules/rule_types';
import type { ResolvedValue } from '../state/state_types';

export interface ResolutionResult {
    finalValue: ResolvedValue;
    /** Rule whose write determines the final value (null under manual review). */
    keptRule: string | null;
    /** Rules whose writes were combined, for MERGE. */
    mergedRules: string[];
    /** Set when MERGE could not apply and PRIORITY was used instead. */
    fallbackFrom?: ConflictStrategy;
    note?: string;
}

export interface ConflictRecord {
    id: string;
    path: string;
    timestamp: number;
    /** In evaluation order. */
    conflictingRules: string[];
    conflictingActions: Action[];
    resolutionStrategy: ConflictStrategy;
    resolutionResult: ResolutionResult;
    resolved: boolean;
}
