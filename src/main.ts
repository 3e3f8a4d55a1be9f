#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { startShell } from './cli/shell';
import { runListRules } from './commands/listRules';
import { runSimulation } from './commands/runSimulation';
import { DEFAULT_SCENARIO, DEFAULT_TICKS, EngineSettings, loadEngineSettings } from './config';
import type { DecisionEngineOptions } from './engine/DecisionEngine';
import { SimulationInput, parseInputSpec } from './inputs/InputTranslator';
import { RuleSetService } from './rules/RuleSetService';
import { SessionManager } from './session/SessionManager';
import { dbg, say } from './utils';

const GENERAL_ERROR = 1;
const SIMULATION_ERROR = 2;
const RULES_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;
// Load environment variables from .env file
dotenv.config();

interface GlobalOptions {
  rules?: string;
  maxChainDepth?: string;
  conflictStrategy?: string;
  eventLifetime?: string;
}

interface RunOptions {
  scenario: string;
  ticks: string;
  input: string[];
  output?: string;
  educational?: boolean;
  verbose?: boolean;
}

/** Environment settings with command-line overrides applied. */
function effectiveSettings(options: GlobalOptions): EngineSettings {
  return loadEngineSettings({
    ...process.env,
    ...(options.rules ? { SIM_RULES_FILE: options.rules } : {}),
    ...(options.maxChainDepth ? { SIM_MAX_CHAIN_DEPTH: options.maxChainDepth } : {}),
    ...(options.conflictStrategy ? { SIM_CONFLICT_STRATEGY: options.conflictStrategy } : {}),
    ...(options.eventLifetime ? { SIM_EVENT_LIFETIME: options.eventLifetime } : {}),
  });
}

function engineOptions(settings: EngineSettings): DecisionEngineOptions {
  return {
    maxChainDepth: settings.maxChainDepth,
    eventLifetime: settings.eventLifetime,
    conflictStrategy: settings.conflictStrategy,
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('harbor-sim')
    .version('1.0.0')
    .description('Explainable rule engine for the harbour tugboat simulation')
    .option('-r, --rules <path>', 'Path to the JSON rule set')
    .option('--max-chain-depth <n>', 'Maximum TRIGGER_RULE chain depth per tick')
    .option('--conflict-strategy <strategy>', 'Default conflict strategy (PRIORITY, LAST_WRITE_WINS, MERGE, MANUAL_REVIEW)')
    .option('--event-lifetime <lifetime>', "How long spawned events stay visible ('tick' or 'persistent')");

  // 'run' command
  program
    .command('run')
    .description('Run a scenario for a number of ticks and print the explanations')
    .option('-s, --scenario <name>', 'Scenario to start from (default, fog, docking, emergency)', DEFAULT_SCENARIO)
    .option('-t, --ticks <n>', 'Number of ticks to run', String(DEFAULT_TICKS))
    .option('-i, --input <spec>', 'Input applied before the first tick, e.g. adjust_speed:speed=3 (repeatable)', collect, [])
    .option('-o, --output <directory>', 'Directory to save the run history to')
    .option('--educational', 'Save explanations in the visitor-facing format')
    .option('-v, --verbose', 'Also print rules whose conditions were not met')
    .action(async (options: RunOptions) => {
      try {
        const settings = effectiveSettings(program.opts<GlobalOptions>());
        const ruleSet = await new RuleSetService(settings.rulesFile).load();
        const inputs: SimulationInput[] = options.input.map(parseInputSpec);
        await runSimulation(ruleSet, {
          scenario: options.scenario,
          ticks: Number(options.ticks),
          inputs,
          outputDir: options.output,
          educational: options.educational,
          verbose: options.verbose,
        }, engineOptions(settings));
        dbg('Run command finished successfully.');
      } catch (error) {
        console.error(`Run command failed: ${error}`);
        process.exit(SIMULATION_ERROR);
      }
    });

  // 'rules' command
  program
    .command('rules')
    .description('Validate the rule set and list its rules')
    .action(async () => {
      try {
        const settings = effectiveSettings(program.opts<GlobalOptions>());
        const service = new RuleSetService(settings.rulesFile);
        say(`Rules file: ${service.filePath}`);
        runListRules(await service.summarize());
      } catch (error) {
        console.error(`Rules command failed: ${error}`);
        process.exit(RULES_ERROR);
      }
    });

  // 'shell' command
  program
    .command('shell')
    .description('Step through a scenario interactively')
    .option('-s, --scenario <name>', 'Scenario to start from', DEFAULT_SCENARIO)
    .action(async (options: { scenario: string }) => {
      try {
        const settings = effectiveSettings(program.opts<GlobalOptions>());
        const ruleSet = await new RuleSetService(settings.rulesFile).load();
        await startShell(new SessionManager(ruleSet, engineOptions(settings)), options.scenario);
      } catch (error) {
        console.error(`Shell failed: ${error}`);
        process.exit(GENERAL_ERROR);
      }
    });

  // --- Parse and Execute ---
  try {
    if (process.argv.length <= 2) {
      program.help();
    }
    await program.parseAsync(process.argv);
  } catch (error) {
    // Catch errors during parsing itself (e.g., invalid options)
    dbg(`Error during command parsing or execution: ${error}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

main().catch(error => {
  dbg(`Unhandled application error: ${error}`);
  process.exit(UNHANDLED_ERROR);
});
