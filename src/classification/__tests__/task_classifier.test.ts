import { describe, expect, it } from 'vitest';
import { FakeReasoningBackend, classificationReply, testConfig } from '../../__tests__/fixtures.js';
import { TaskClassifier } from '../task_classifier.js';

const config = testConfig().classification;

function classifier(backend: FakeReasoningBackend | null = null, timeoutMs = 100): TaskClassifier {
  return new TaskClassifier(backend, config, { timeoutMs });
}

// ============================================================================
// HEURISTICS
// ============================================================================

describe('TaskClassifier heuristics', () => {
  it('should classify a read-only endpoint as a low complexity API task', () => {
    const result = classifier().classifyHeuristically('Add a new read-only report endpoint', { tech_stack: ['python'] });

    expect(result).toEqual({
      projectType: 'api_microservices',
      complexity: 'low',
      riskFlags: ['fallback_used'],
      confidence: 0.35,
    });
  });

  it('should flag authentication work as security sensitive', () => {
    const result = classifier().classifyHeuristically('Implement user authentication with JWT');

    expect(result).toEqual({
      projectType: 'web_app',
      complexity: 'medium',
      riskFlags: ['security_sensitive', 'fallback_used'],
      confidence: 0.35,
    });
  });

  it('should cap heuristic confidence at 0.5', () => {
    const result = classifier().classifyHeuristically(
      'Deploy the REST api with jwt auth to production with cache optimize'
    );

    expect(result.projectType).toBe('api_microservices');
    expect(result.complexity).toBe('medium');
    expect(result.riskFlags).toEqual([
      'security_sensitive',
      'production_impact',
      'performance_critical',
      'fallback_used',
    ]);
    expect(result.confidence).toBe(0.5);
  });

  it('should let high complexity keywords win', () => {
    const result = classifier().classifyHeuristically('Fix the typo, then migrate to a distributed architecture');

    expect(result.complexity).toBe('high');
  });

  it('should use defaults when nothing matches', () => {
    const result = classifier().classifyHeuristically('Do the thing');

    expect(result).toEqual({
      projectType: 'web_app',
      complexity: 'medium',
      riskFlags: ['fallback_used'],
      confidence: 0.2,
    });
  });

  it('should honour a project type hint from the context', () => {
    const result = classifier().classifyHeuristically('Add an endpoint', { project_type: 'CLI_TOOL' });

    expect(result.projectType).toBe('cli_tool');
  });

  it('should be deterministic', () => {
    const first = classifier().classifyHeuristically('Implement user authentication with JWT');
    const second = classifier().classifyHeuristically('Implement user authentication with JWT');

    expect(second).toEqual(first);
  });
});

// ============================================================================
// BACKEND PATH
// ============================================================================

describe('TaskClassifier with a backend', () => {
  it('should map the backend reply into the AI confidence range', async () => {
    const backend = new FakeReasoningBackend([
      classificationReply({ risk_flags: ['Security Sensitive', 'fallback_used'] }),
    ]);

    const outcome = await classifier(backend).classify('Add an endpoint', { tech_stack: ['go'] });

    expect(outcome).toEqual({
      mode: 'ai',
      value: {
        projectType: 'api_microservices',
        complexity: 'low',
        riskFlags: ['security_sensitive'],
        confidence: 0.91,
      },
    });
    expect(backend.lastPrompt()).toContain('Task: Add an endpoint');
    expect(backend.lastPrompt()).toContain('- tech_stack: go');
  });

  it('should accept a reply wrapped in a code fence', async () => {
    const backend = new FakeReasoningBackend([
      'Here you go:\n```json\n' + classificationReply({ confidence: 0 }) + '\n```',
    ]);

    const outcome = await classifier(backend).classify('Add an endpoint');

    expect(outcome.mode).toBe('ai');
    expect(outcome.value.confidence).toBe(0.55);
  });

  it('should fall back on a reply that does not validate', async () => {
    const backend = new FakeReasoningBackend([classificationReply({ project_type: 'spaceship' })]);

    const outcome = await classifier(backend).classify('Implement user authentication with JWT');

    expect(outcome.mode).toBe('fallback');
    expect(outcome.value.riskFlags).toEqual(['security_sensitive', 'fallback_used']);
    if (outcome.mode === 'fallback') {
      expect(outcome.reason).toMatch(/^Reasoning backend fake invalid_response: /);
    }
  });

  it('should fall back when the backend times out', async () => {
    const outcome = await classifier(new FakeReasoningBackend([{ hang: true }]), 20).classify('Fix a typo');

    expect(outcome.mode).toBe('fallback');
    expect(outcome.value.confidence).toBeLessThanOrEqual(0.5);
    if (outcome.mode === 'fallback') {
      expect(outcome.reason).toBe('Reasoning backend fake timeout: Timeout after 20ms: classify task');
    }
  });

  it('should fall back when the backend fails', async () => {
    const outcome = await classifier(new FakeReasoningBackend([new Error('exit code 1')])).classify('Fix a typo');

    expect(outcome.mode).toBe('fallback');
    if (outcome.mode === 'fallback') {
      expect(outcome.reason).toBe('Reasoning backend fake execution_failed: exit code 1');
    }
  });

  it('should fall back without a backend', async () => {
    const outcome = await classifier().classify('Fix a typo');

    expect(outcome.mode).toBe('fallback');
    expect(outcome.value.riskFlags).toEqual(['fallback_used']);
  });

  it('should not call the backend after cancellation', async () => {
    const backend = new FakeReasoningBackend([classificationReply()]);
    const controller = new AbortController();
    controller.abort();

    const outcome = await classifier(backend).classify('Fix a typo', {}, controller.signal);

    expect(outcome.mode).toBe('fallback');
    expect(backend.calls).toHaveLength(0);
  });
});
