import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FakeReasoningBackend } from '../../__tests__/fixtures.js';
import { requestCompletion, requestStructured } from '../backend_request.js';

const messages = [{ role: 'user' as const, content: 'Classify this task' }];

describe('requestCompletion', () => {
  it('should report a missing backend as not_configured', async () => {
    const result = await requestCompletion(null, { messages, timeoutMs: 100, purpose: 'classify task' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.provider).toBe('none');
      expect(result.error.reason).toBe('not_configured');
    }
  });

  it('should return the reply text', async () => {
    const backend = new FakeReasoningBackend(['hello']);

    const result = await requestCompletion(backend, { messages, timeoutMs: 100, purpose: 'classify task' });

    expect(result).toEqual({ ok: true, value: 'hello' });
    expect(backend.calls[0]?.modelId).toBe('fake-model');
  });

  it('should time out a call that never answers and abort it', async () => {
    const backend = new FakeReasoningBackend([{ hang: true }]);

    const result = await requestCompletion(backend, { messages, timeoutMs: 20, purpose: 'classify task' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('timeout');
      expect(result.error.message).toBe('Reasoning backend fake timeout: Timeout after 20ms: classify task');
    }
    expect(backend.calls[0]?.signal?.aborted).toBe(true);
  });

  it('should report backend exceptions as execution_failed', async () => {
    const backend = new FakeReasoningBackend([new Error('exit code 2')]);

    const result = await requestCompletion(backend, { messages, timeoutMs: 100, purpose: 'select rules' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('execution_failed');
      expect(result.error.message).toBe('Reasoning backend fake execution_failed: exit code 2');
    }
  });

  it('should not call the backend when already cancelled', async () => {
    const backend = new FakeReasoningBackend(['unused']);
    const controller = new AbortController();
    controller.abort();

    const result = await requestCompletion(backend, {
      messages,
      timeoutMs: 100,
      purpose: 'select rules',
      signal: controller.signal,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('cancelled');
    expect(backend.calls).toHaveLength(0);
  });

  it('should report cancellation during the call', async () => {
    const backend = new FakeReasoningBackend([{ hang: true }]);
    const controller = new AbortController();

    const pending = requestCompletion(backend, {
      messages,
      timeoutMs: 1000,
      purpose: 'select rules',
      signal: controller.signal,
    });
    controller.abort();
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('cancelled');
  });
});

describe('requestStructured', () => {
  const Schema = z.object({ confidence: z.number() });

  it('should parse a fenced JSON reply', async () => {
    const backend = new FakeReasoningBackend(['```json\n{"confidence": 0.4}\n```']);

    const result = await requestStructured(backend, { messages, timeoutMs: 100, purpose: 'classify task' }, Schema);

    expect(result).toEqual({ ok: true, value: { confidence: 0.4 } });
  });

  it('should report an unparseable reply as invalid_response', async () => {
    const backend = new FakeReasoningBackend(['no idea']);

    const result = await requestStructured(backend, { messages, timeoutMs: 100, purpose: 'classify task' }, Schema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid_response');
      expect(result.error.provider).toBe('fake');
    }
  });
});
