import { describe, expect, it } from 'vitest';
import { sampleCatalog, testConfig } from '../../__tests__/fixtures.js';
import { InvalidClassificationError, NotFoundError } from '../../core/errors.js';
import { RuleCatalog } from '../../rules/rule_catalog.js';
import type { TaskClassification } from '../../types.js';
import { PlanGenerator, parseClassification } from '../plan_generator.js';

function classification(complexity: TaskClassification['complexity']): TaskClassification {
  return { projectType: 'api_microservices', complexity, riskFlags: [], confidence: 0.9 };
}

function generator(catalog = sampleCatalog()): PlanGenerator {
  return new PlanGenerator(catalog, testConfig().planning);
}

describe('PlanGenerator', () => {
  it('should use the lightweight template for low complexity', () => {
    const plan = generator().generate(classification('low'), ['base', 'api'], 'fallback');

    expect(plan.template).toBe('lightweight');
    expect(plan.mode).toBe('fallback');
    expect(plan.stages.map((stage) => ({ name: stage.name, ruleIds: stage.ruleIds, qualityGates: stage.qualityGates })))
      .toEqual([
        { name: 'implementation', ruleIds: ['base', 'api'], qualityGates: ['policy-compliance', 'api-contract-check'] },
        { name: 'verification', ruleIds: [], qualityGates: [] },
      ]);
  });

  it('should spread rules over the standard template by category', () => {
    const plan = generator().generate(classification('medium'), ['base', 'sec', 'tests', 'docs'], 'ai');

    expect(plan.template).toBe('standard');
    expect(plan.mode).toBe('ai');
    expect(plan.stages).toEqual([
      {
        name: 'planning',
        description: 'Clarify scope, design and risks before writing code',
        ruleIds: ['base'],
        qualityGates: ['policy-compliance'],
      },
      {
        name: 'implementation',
        description: 'Make the change with the selected rules applied',
        ruleIds: ['sec'],
        qualityGates: ['security-review', 'secrets-scan'],
      },
      {
        name: 'verification',
        description: 'Check the change against its quality gates',
        ruleIds: ['tests'],
        qualityGates: ['unit-tests-pass', 'coverage-threshold'],
      },
      {
        name: 'review',
        description: 'Review the result and record follow-ups',
        ruleIds: ['docs'],
        qualityGates: ['docs-updated'],
      },
    ]);
  });

  it('should deduplicate rules and quality gates within a stage', () => {
    const catalog = RuleCatalog.load([
      { id: 'auth', title: 'Auth', category: 'security' },
      { id: 'crypto', title: 'Crypto', category: 'security' },
    ]);

    const plan = generator(catalog).generate(classification('high'), ['auth', 'crypto', 'auth'], 'fallback');

    const implementation = plan.stages.find((stage) => stage.name === 'implementation');
    expect(implementation?.ruleIds).toEqual(['auth', 'crypto']);
    expect(implementation?.qualityGates).toEqual(['security-review', 'secrets-scan']);
  });

  it('should keep the template stages for an empty selection', () => {
    const plan = generator().generate(classification('high'), [], 'fallback');

    expect(plan.stages.map((stage) => stage.name)).toEqual(['planning', 'implementation', 'verification', 'review']);
    expect(plan.stages.every((stage) => stage.ruleIds.length === 0)).toBe(true);
  });

  it('should reject a classification without complexity', () => {
    const attempt = () => generator().generate({ projectType: 'web_app', riskFlags: [], confidence: 0.4 }, [], 'fallback');

    expect(attempt).toThrow(InvalidClassificationError);
    expect(attempt).toThrow('Invalid classification: complexity is missing or invalid');
  });

  it('should reject an unknown rule id', () => {
    expect(() => generator().generate(classification('low'), ['ghost'], 'fallback')).toThrow(NotFoundError);
  });
});

describe('parseClassification', () => {
  it('should return a valid classification unchanged', () => {
    expect(parseClassification(classification('low'))).toEqual(classification('low'));
  });

  it('should list every issue', () => {
    try {
      parseClassification({ projectType: 'spaceship', complexity: 'low', riskFlags: [], confidence: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidClassificationError);
      if (error instanceof InvalidClassificationError) {
        expect(error.message).toBe('Invalid classification: classification does not match the expected shape');
        expect(error.issues).toHaveLength(2);
      }
    }
  });
});
