import { InvalidActionError, TypeMismatchError } from '../errors';
import { isFieldPath, resolvePath } from '../state/pathResolver';
import type { ResolvedValue, Value, WorldState } from '../state/state_types';

const EXPRESSION_PATTERN = /^\{\{(.+)\}\}$/s;

type Token =
    | { kind: 'number'; value: number }
    | { kind: 'path'; value: string }
    | { kind: 'op'; value: '+' | '-' | '*' | '/' }
    | { kind: 'paren'; value: '(' | ')' };

const TOKEN_PATTERN = /\s*(?:(\d+(?:\.\d+)?)|([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)+)|([-+*/])|([()]))/y;

export function isExpression(value: unknown): value is string {
    return typeof value === 'string' && EXPRESSION_PATTERN.test(value.trim());
}

function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    TOKEN_PATTERN.lastIndex = 0;
    let position = 0;
    while (position < source.length) {
        if (source.slice(position).trim() === '') break;
        TOKEN_PATTERN.lastIndex = position;
        const match = TOKEN_PATTERN.exec(source);
        if (!match) {
            throw new InvalidActionError(`Unexpected character in expression '${source}' at position ${position}`);
        }
        const [, num, path, op, paren] = match;
        if (num !== undefined) tokens.push({ kind: 'number', value: Number(num) });
        else if (path !== undefined) tokens.push({ kind: 'path', value: path });
        else if (op === '+' || op === '-' || op === '*' || op === '/') tokens.push({ kind: 'op', value: op });
        else if (paren === '(' || paren === ')') tokens.push({ kind: 'paren', value: paren });
        position = TOKEN_PATTERN.lastIndex;
    }
    return tokens;
}

/**
 * Recursive-descent evaluator for `+ - * /` over numbers and field paths.
 *
 *   expr   := term (('+' | '-') term)*
 *   term   := factor (('*' | '/') factor)*
 *   factor := ('+' | '-') factor | number | path | '(' expr ')'
 */
class ExpressionParser {
    private index = 0;

    constructor(
        private readonly source: string,
        private readonly tokens: Token[],
        private readonly state: WorldState
    ) {}

    parse(): number {
        const value = this.expr();
        if (this.index < this.tokens.length) {
            throw new InvalidActionError(`Unexpected trailing input in expression '${this.source}'`);
        }
        return value;
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private expr(): number {
        let value = this.term();
        while (true) {
            const token = this.peek();
            if (token?.kind !== 'op' || (token.value !== '+' && token.value !== '-')) break;
            this.index++;
            const rhs = this.term();
            value = token.value === '+' ? value + rhs : value - rhs;
        }
        return value;
    }

    private term(): number {
        let value = this.factor();
        while (true) {
            const token = this.peek();
            if (token?.kind !== 'op' || (token.value !== '*' && token.value !== '/')) break;
            this.index++;
            const rhs = this.factor();
            if (token.value === '/' && rhs === 0) {
                throw new InvalidActionError(`Division by zero in expression '${this.source}'`);
            }
            value = token.value === '*' ? value * rhs : value / rhs;
        }
        return value;
    }

    private factor(): number {
        const token = this.peek();
        if (!token) {
            throw new InvalidActionError(`Unexpected end of expression '${this.source}'`);
        }
        this.index++;
        switch (token.kind) {
            case 'number':
                return token.value;
            case 'path': {
                const resolved = resolvePath(this.state, token.value);
                if (typeof resolved !== 'number') {
                    throw new TypeMismatchError(`Expression operand '${token.value}' is not numeric (got ${JSON.stringify(resolved)})`);
                }
                return resolved;
            }
            case 'op':
                if (token.value === '-') return -this.factor();
                if (token.value === '+') return this.factor();
                break;
            case 'paren':
                if (token.value === '(') {
                    const inner = this.expr();
                    const closing = this.peek();
                    if (closing?.kind !== 'paren' || closing.value !== ')') {
                        throw new InvalidActionError(`Missing ')' in expression '${this.source}'`);
                    }
                    this.index++;
                    return inner;
                }
                break;
        }
        throw new InvalidActionError(`Unexpected '${token.value}' in expression '${this.source}'`);
    }
}

/** Evaluates the body of a `{{ ... }}` expression against the working state. */
export function evaluateExpression(source: string, state: WorldState): number {
    const tokens = tokenize(source);
    if (tokens.length === 0) {
        throw new InvalidActionError('Empty expression');
    }
    return new ExpressionParser(source, tokens, state).parse();
}

/**
 * Resolves an operand that may be a `{{ expression }}`, a field path or a
 * literal.
 */
export function resolveOperand(operand: Value, state: WorldState): ResolvedValue {
    if (typeof operand === 'string') {
        const match = EXPRESSION_PATTERN.exec(operand.trim());
        if (match) {
            return evaluateExpression(match[1].trim(), state);
        }
    }
    if (isFieldPath(operand)) {
        return resolvePath(state, operand);
    }
    return operand;
}
