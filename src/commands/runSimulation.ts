import { DecisionEngine, DecisionEngineOptions } from '../engine/DecisionEngine';
import { toEducationalFormat } from '../explanations/ExplanationBuilder';
import type { SimulationInput } from '../inputs/InputTranslator';
import { formatValue } from '../rules/conditionEvaluator';
import type { RuleSet } from '../rules/rule_types';
import { SCENARIO_NAMES, createScenario, isScenarioName } from '../scenarios/harborScenarios';
import type { StateSnapshot } from '../state/state_types';
import { SayFn, dbg, persistOutput, say } from '../utils';

export const HISTORY_FILE_NAME = 'simulation_history.json';

export interface RunSimulationOptions {
    scenario: string;
    ticks: number;
    /** Submitted before the first tick. */
    inputs?: SimulationInput[];
    /** When set, the run's history is written there as JSON. */
    outputDir?: string;
    /** Write explanations in the visitor-facing educational format. */
    educational?: boolean;
    /** Also print rules whose conditions were not met. */
    verbose?: boolean;
}

type PersistOutputFn = typeof persistOutput;

/** Renders one committed tick for the console. */
export function formatSnapshot(snapshot: StateSnapshot, verbose = false): string[] {
    const lines = [`--- Tick ${snapshot.tick} ---`];
    if (snapshot.inputsApplied.length > 0) {
        lines.push(`Inputs: ${snapshot.inputsApplied.join(', ')}`);
    }
    for (const failure of snapshot.inputFailures) {
        lines.push(`Input rejected: ${failure.input}: ${failure.error}`);
    }
    for (const explanation of snapshot.explanations) {
        if (explanation.triggered || verbose) {
            lines.push(`[${explanation.ruleId}] ${explanation.message}`);
        }
        for (const error of explanation.errors) {
            lines.push(`  ! ${error.name}: ${error.message}`);
        }
    }
    for (const conflict of snapshot.conflicts) {
        const status = conflict.resolved ? '' : ' (unresolved)';
        lines.push(`Conflict ${conflict.id} on ${conflict.path} [${conflict.conflictingRules.join(', ')}]: ${conflict.resolutionStrategy} -> ${formatValue(conflict.resolutionResult.finalValue)}${status}`);
    }
    if (snapshot.chainOverflow) {
        lines.push(`Chain overflow: ${snapshot.chainOverflow.chain.join(' -> ')} (max depth ${snapshot.chainOverflow.maxDepth})`);
    }
    const stats = snapshot.stats;
    lines.push(`${stats.rulesTriggered}/${stats.rulesEvaluated} rule(s) triggered, ${stats.actionsApplied} action(s) applied, ${stats.conflicts} conflict(s)`);
    return lines;
}

/** The JSON document saved for a run. */
export function historyDocument(scenario: string, snapshots: readonly StateSnapshot[], educational = false): string {
    const history = educational
        ? snapshots.map(s => ({ ...s, explanations: s.explanations.map(toEducationalFormat) }))
        : snapshots;
    return JSON.stringify({ scenario, ticks: snapshots.length, history }, null, 2);
}

/**
 * Runs a scenario for a number of ticks, prints each tick and optionally
 * saves the history.
 *
 * @returns The committed snapshots, in tick order.
 */
export async function runSimulation(
    ruleSet: RuleSet,
    options: RunSimulationOptions,
    engineOptions: DecisionEngineOptions = {},
    sayFn: SayFn = say,
    persistOutputFn: PersistOutputFn = persistOutput
): Promise<StateSnapshot[]> {
    if (!isScenarioName(options.scenario)) {
        throw new Error(`Unknown scenario '${options.scenario}'. Available: ${SCENARIO_NAMES.join(', ')}`);
    }
    if (!Number.isInteger(options.ticks) || options.ticks < 1) {
        throw new Error(`Tick count must be a positive integer, got ${options.ticks}`);
    }

    dbg(`Running scenario "${options.scenario}" for ${options.ticks} tick(s).`);
    const engine = new DecisionEngine(createScenario(options.scenario), ruleSet, engineOptions);
    for (const input of options.inputs ?? []) {
        engine.submitInput(input);
    }

    const snapshots: StateSnapshot[] = [];
    for (let i = 0; i < options.ticks; i++) {
        const snapshot = engine.tick();
        snapshots.push(snapshot);
        formatSnapshot(snapshot, options.verbose).forEach(line => sayFn(line));
    }

    if (options.outputDir) {
        try {
            await persistOutputFn(historyDocument(options.scenario, snapshots, options.educational), options.outputDir, HISTORY_FILE_NAME);
        } catch (error) {
            console.error(`Failed to save simulation history: ${error}`);
            throw error;
        }
    }
    return snapshots;
}
