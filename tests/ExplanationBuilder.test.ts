import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
    ExplanationBuilder,
    expandTemplate,
    formatTemplateValue,
    toEducationalFormat,
} from '../src/explanations/ExplanationBuilder';
import type { ActionApplication } from '../src/explanations/explanation_types';
import { evaluateAll } from '../src/rules/conditionEvaluator';
import type { Rule } from '../src/rules/rule_types';
import { makeRule, makeWorld } from './fixtures';

const SPEED = 'agents.tugboat_1.speed';

const slowDown: ActionApplication = {
    action: { type: 'SET', target: SPEED, value: 4 },
    before: 6,
    after: 4,
    success: true,
    message: 'SET agents.tugboat_1.speed: 6 -> 4',
};

function fogRule(template: string): Rule {
    return makeRule('fog_slowdown', 5, [{ left: 'environment.visibility', operator: '<', right: 2 }], [slowDown.action], {
        explanationTemplate: template,
    });
}

function triggeredBuilder(rule: Rule, triggeredBy: string | null = null): ExplanationBuilder {
    const builder = new ExplanationBuilder(rule, 3, triggeredBy);
    builder.recordConditions(evaluateAll(rule.conditions, rule.logic, makeWorld()));
    builder.recordAction(slowDown);
    return builder;
}

describe('ExplanationBuilder', () => {
    describe('formatTemplateValue', () => {
        it('should print whole numbers plainly and other numbers to two places', () => {
            expect(formatTemplateValue(5)).to.equal('5');
            expect(formatTemplateValue(1.234)).to.equal('1.23');
            expect(formatTemplateValue(null)).to.equal('absent');
            expect(formatTemplateValue(['coal', 2])).to.equal('coal, 2');
            expect(formatTemplateValue(true)).to.equal('true');
        });
    });

    describe('expandTemplate', () => {
        it('should substitute known names and leave unknown ones verbatim', () => {
            const expansion = expandTemplate('Speed {{ speed }} at {{missing}} and {{missing}}', { speed: 4.5 });
            expect(expansion.message).to.equal('Speed 4.50 at {{missing}} and {{missing}}');
            expect(expansion.unresolved).to.deep.equal(['missing']);
        });
    });

    it('should render the template from cause and effect values', () => {
        const rule = fogRule('Speed reduced to {{agents.tugboat_1.speed}} because visibility was {{environment.visibility}} ({{missing}})');
        const explanation = triggeredBuilder(rule).build();

        expect(explanation.triggered).to.be.true;
        expect(explanation.message).to.equal('Speed reduced to 4 because visibility was 1.20 ({{missing}})');
        expect(explanation.sideEffects).to.deep.equal(['Unresolved template placeholder: {{missing}}']);
        expect(explanation.cause.values).to.deep.equal({ 'environment.visibility': 1.2 });
        expect(explanation.cause.conditionsMet).to.deep.equal([
            { left: 'environment.visibility', operator: '<', right: '2', leftValue: 1.2, rightValue: 2 },
        ]);
        expect(explanation.effect.changes).to.deep.equal([{ type: 'SET', target: SPEED, from: 6, to: 4 }]);
    });

    it('should expose the rule context and prefixed names to templates', () => {
        const rule = fogRule('{{triggered_by}} -> {{rule_id}} at {{timestamp}}, now {{effect.agents.tugboat_1.speed}}');
        expect(triggeredBuilder(rule, 'starter').build().message).to.equal('starter -> fog_slowdown at 3, now 4');
    });

    it('should describe a triggered rule without a template by its action count', () => {
        expect(triggeredBuilder(fogRule('')).build().message).to.equal('Rule fog_slowdown triggered: 1 action(s) applied');
    });

    it('should summarize why a rule did not fire', () => {
        const rule = makeRule('quiet', 1, [
            { left: 'environment.visibility', operator: '>', right: 5 },
            { left: 'environment.zone', operator: '==', right: 'open_water' },
        ], [slowDown.action]);
        const builder = new ExplanationBuilder(rule, 0, null);
        builder.recordConditions(evaluateAll(rule.conditions, rule.logic, makeWorld()));
        const explanation = builder.build();

        expect(explanation.triggered).to.be.false;
        expect(explanation.decidedBy).to.equal(0);
        expect(explanation.message).to.equal('Rule quiet not triggered: 1/2 conditions met (AND)');
    });

    it('should record conflicts once and skip failed actions in the effect', () => {
        const builder = triggeredBuilder(fogRule(''));
        builder.recordConflict('conflict-3-1', 'Conflict conflict-3-1 on agents.tugboat_1.speed: PRIORITY -> 4');
        builder.recordConflict('conflict-3-1', 'Conflict conflict-3-1 on agents.tugboat_1.speed: PRIORITY -> 4');
        builder.recordAction({ ...slowDown, success: false, message: 'SET failed: TypeMismatchError: bad' });
        const explanation = builder.build();

        expect(explanation.conflictsEncountered).to.deep.equal(['conflict-3-1']);
        expect(explanation.sideEffects).to.deep.equal(['Conflict conflict-3-1 on agents.tugboat_1.speed: PRIORITY -> 4']);
        expect(explanation.actionsApplied).to.have.length(2);
        expect(explanation.effect.changes).to.have.length(1);
    });

    it('should reshape an explanation for visitors', () => {
        const educational = toEducationalFormat(triggeredBuilder(fogRule(''), 'starter').build());

        expect(educational.when).to.equal('Time step 3');
        expect(educational.why.conditions).to.deep.equal([{
            condition: 'environment.visibility < 2',
            actualValues: '1.2 vs 2',
            result: true,
            explanation: 'environment.visibility [1.2] < 2 [2] -> true',
        }]);
        expect(educational.whatHappened.actions).to.deep.equal([{
            action: 'SET',
            target: SPEED,
            changedFrom: 6,
            changedTo: 4,
            explanation: 'SET agents.tugboat_1.speed: 6 -> 4',
        }]);
        expect(educational.causalChain).to.deep.equal({ triggeredBy: 'starter', triggeredRules: [], events: [] });
    });
});
