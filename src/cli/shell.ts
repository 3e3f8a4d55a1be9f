import inquirer from 'inquirer';
import { formatSnapshot } from '../commands/runSimulation';
import { describeError } from '../errors';
import { describeInput, parseInputSpec, parseLiteral } from '../inputs/InputTranslator';
import { formatValue } from '../rules/conditionEvaluator';
import { Session, SessionManager } from '../session/SessionManager';
import { resolvePath } from '../state/pathResolver';
import type { ReplayCursor } from '../state/StateStore';
import type { StateSnapshot } from '../state/state_types';
import { SayFn, dbg, say } from '../utils';

const EXIT_COMMAND = 'exit';

export const SHELL_HELP = [
    'Available commands:',
    '  tick [n]              run one or n ticks',
    '  input <type[:k=v,..]> queue a named input, e.g. input adjust_speed:speed=3',
    '  set <path> <value>    queue a direct write, e.g. set agents.tugboat.speed 8',
    '  state [path]          show the committed state or one value',
    '  explain [rule_id]     explain the last tick, or one rule in it',
    '  history               list committed ticks',
    '  rewind <tick>         replay a committed tick without re-running it',
    '  back | forward        step the replay cursor',
    '  reset                 restart the scenario',
    '  exit',
];

/** What the shell is currently looking at. */
export interface ShellContext {
    sessions: SessionManager;
    session: Session;
    cursor?: ReplayCursor;
}

type PromptFn = (questions: { type: 'input'; name: 'command'; message: string }[]) => Promise<{ command: string }>;

/**
 * Prompts the user for command input in the interactive shell.
 *
 * @returns Promise that resolves to the trimmed command string entered by user
 */
export async function getCommandInput(promptFn: PromptFn = (questions) => inquirer.prompt<{ command: string }>(questions)): Promise<string> {
    const answers = await promptFn([{ type: 'input', name: 'command', message: 'harbor> ' }]);
    return answers.command.trim();
}

/**
 * Parses a command line input string into a command and arguments.
 *
 * Handles quoted arguments by preserving spaces within quotes and removing the quotes.
 * For example: `set environment.zone "docking zone"` becomes:
 * - command: "set"
 * - args: ["environment.zone", "docking zone"]
 */
export function parseCommand(commandInput: string): { command: string; args: string[] } {
    const parts = commandInput.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
    const command = parts[0]?.toLowerCase() || '';
    const args = parts.slice(1).map((arg: string) =>
        (arg.startsWith('"') && arg.endsWith('"')) || (arg.startsWith("'") && arg.endsWith("'"))
            ? arg.slice(1, -1)
            : arg
    );
    return { command, args };
}

function lastSnapshot(ctx: ShellContext): StateSnapshot | undefined {
    const history = ctx.session.engine.history();
    return history[history.length - 1];
}

function cursorOf(ctx: ShellContext): ReplayCursor {
    if (!ctx.cursor) ctx.cursor = ctx.session.engine.replay();
    return ctx.cursor;
}

function showReplay(snapshot: StateSnapshot | undefined, sayFn: SayFn): void {
    if (!snapshot) {
        sayFn('Nothing to replay there.');
        return;
    }
    sayFn(`Replaying tick ${snapshot.tick} (read-only):`);
    formatSnapshot(snapshot, true).forEach(line => sayFn(line));
}

function explain(ctx: ShellContext, ruleId: string | undefined, sayFn: SayFn): void {
    const snapshot = lastSnapshot(ctx);
    if (!snapshot) {
        sayFn('No ticks have run yet.');
        return;
    }
    const explanations = ruleId ? snapshot.explanations.filter(e => e.ruleId === ruleId) : snapshot.explanations;
    if (explanations.length === 0) {
        sayFn(`Rule '${ruleId}' was not evaluated in tick ${snapshot.tick}.`);
        return;
    }
    for (const explanation of explanations) {
        const via = explanation.triggeredBy ? ` via ${explanation.triggeredBy}` : '';
        sayFn(`${explanation.ruleId} (priority ${explanation.priority}${via}): ${explanation.message}`);
        explanation.conditionsEvaluated.forEach(c => sayFn(`  if   ${c.message}`));
        explanation.actionsApplied.forEach(a => sayFn(`  then ${a.message}`));
        explanation.sideEffects.forEach(s => sayFn(`  note ${s}`));
    }
}

/**
 * Runs one shell command against the current session.
 *
 * @returns false when the shell should stop.
 */
export function handleShellCommand(command: string, args: string[], ctx: ShellContext, sayFn: SayFn = say): boolean {
    const engine = ctx.session.engine;
    switch (command) {
        case '':
            return true;
        case EXIT_COMMAND:
            sayFn('Exiting harbor simulation shell...');
            return false;
        case 'help':
            SHELL_HELP.forEach(line => sayFn(line));
            return true;
        case 'tick': {
            const count = args[0] === undefined ? 1 : Number(args[0]);
            if (!Number.isInteger(count) || count < 1) {
                sayFn(`Tick count must be a positive integer, got '${args[0]}'.`);
                return true;
            }
            engine.run(count).forEach(snapshot => formatSnapshot(snapshot).forEach(line => sayFn(line)));
            return true;
        }
        case 'input': {
            if (!args[0]) {
                sayFn('Usage: input <type[:key=value,...]>');
                return true;
            }
            const input = parseInputSpec(args[0]);
            engine.submitInput(input);
            sayFn(`Queued ${describeInput(input)} for the next tick.`);
            return true;
        }
        case 'set': {
            if (args.length < 2) {
                sayFn('Usage: set <path> <value>');
                return true;
            }
            const value = parseLiteral(args[1]);
            engine.submitWrite(args[0], value);
            sayFn(`Queued ${args[0]} = ${formatValue(value)} for the next tick.`);
            return true;
        }
        case 'state':
            if (args[0]) {
                sayFn(`${args[0]} = ${formatValue(resolvePath(engine.state(), args[0]))}`);
            } else {
                sayFn(JSON.stringify(engine.state(), null, 2));
            }
            return true;
        case 'explain':
            explain(ctx, args[0], sayFn);
            return true;
        case 'history': {
            const history = engine.history();
            if (history.length === 0) sayFn('No ticks have run yet.');
            for (const snapshot of history) {
                sayFn(`tick ${snapshot.tick}: ${snapshot.stats.rulesTriggered}/${snapshot.stats.rulesEvaluated} rule(s) triggered, ${snapshot.stats.conflicts} conflict(s)`);
            }
            return true;
        }
        case 'rewind': {
            const tick = Number(args[0]);
            if (args[0] === undefined || !Number.isInteger(tick)) {
                sayFn('Usage: rewind <tick>');
                return true;
            }
            showReplay(cursorOf(ctx).seek(tick), sayFn);
            return true;
        }
        case 'back':
            showReplay(cursorOf(ctx).back(), sayFn);
            return true;
        case 'forward':
            showReplay(cursorOf(ctx).forward(), sayFn);
            return true;
        case 'reset':
            ctx.session = ctx.sessions.reset(ctx.session.id);
            ctx.cursor = undefined;
            sayFn(`Session reset to scenario '${ctx.session.scenario}'.`);
            return true;
        default:
            sayFn(`Unknown command '${command}'. Type 'help' for the list.`);
            return true;
    }
}

/**
 * Starts an interactive shell over one simulation session. Command failures
 * are reported and the shell keeps running.
 */
export async function startShell(sessions: SessionManager, scenario: string, getInputFn: () => Promise<string> = getCommandInput) {
    const ctx: ShellContext = { sessions, session: sessions.create(scenario) };
    say(`Starting interactive shell on scenario '${ctx.session.scenario}'. Type "help" for commands, "exit" to quit.`);

    let shellRunning = true;
    while (shellRunning) {
        const commandInput = await getInputFn();
        const { command, args } = parseCommand(commandInput);
        try {
            shellRunning = handleShellCommand(command, args, ctx);
        } catch (error) {
            const recorded = describeError(error);
            console.error(`Error: ${recorded.name}: ${recorded.message}`);
            dbg(`Shell command "${commandInput}" failed.`);
        }
    }
    sessions.delete(ctx.session.id);
}
