import type { RuleSummary } from '../rules/RuleSetService';
import { SayFn, say } from '../utils';

/** One console line per rule, in file order. */
export function formatRuleSummary(summary: RuleSummary): string {
    const category = summary.category ?? 'uncategorized';
    const tags = summary.tags.length > 0 ? ` [${summary.tags.join(', ')}]` : '';
    return `${summary.id} (priority ${summary.priority}, ${summary.logic}, ${summary.conditions} condition(s), ${summary.actions} action(s)) ${category}${tags}`;
}

export function runListRules(summaries: RuleSummary[], sayFn: SayFn = say): void {
    sayFn(`${summaries.length} rule(s):`);
    for (const summary of summaries) {
        sayFn(`  ${formatRuleSummary(summary)}`);
    }
}
