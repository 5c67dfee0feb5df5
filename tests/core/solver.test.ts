import { afterEach, describe, expect, it, vi } from 'vitest';

import { solve } from '../../src/core/solver.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { createMockClient } from '../../src/llm/mock.js';
import { createLLMClient } from '../../src/llm/index.js';
import type { LLMClient } from '../../src/llm/client.js';
import { FAILED_REASONING } from '../../src/config/defaults.js';
import { check, execJSON, promptFixture, verifyJSON } from '../helpers.js';

const PLAN = '1. Read the numbers\n2. Add them\n3. Report the sum';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
});

describe('solve', () => {
  it('returns success on the first attempt when everything passes', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('4', 'Two plus two is four.'),
      verifyJSON(true, [check('arithmetic', true, '2 + 2 = 4')]),
    ]);

    const result = await solve('2+2?', { client, prompts: promptFixture });

    expect(result).toEqual({
      answer: '4',
      status: 'success',
      reasoning_visible_to_user: 'Two plus two is four.',
      metadata: {
        plan: PLAN,
        checks: [check('arithmetic', true, '2 + 2 = 4')],
        retries: 0,
      },
    });
    expect(client.calls).toHaveLength(3);
  });

  it('fails after the only attempt when maxRetries is 0', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('5', 'Two plus two is five.'),
      verifyJSON(false, [check('arithmetic', false, '2 + 2 is not 5')], 'wrong sum'),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 0,
    });

    expect(result.status).toBe('failed');
    expect(result.metadata.retries).toBe(0);
    expect(result.answer).toBe('5');
    expect(result.reasoning_visible_to_user).toBe('Two plus two is five.');
    expect(result.metadata.plan).toBe(PLAN);
    expect(result.metadata.checks).toEqual([
      check('arithmetic', false, '2 + 2 is not 5'),
    ]);
    expect(client.calls).toHaveLength(3);
  });

  it('keeps checks from every attempt when the third attempt passes', async () => {
    const client = createMockClient([
      'plan A',
      execJSON('3', 'first try'),
      verifyJSON(false, [check('attempt-0', false)]),
      'plan B',
      execJSON('5', 'second try'),
      verifyJSON(false, [check('attempt-1', false)]),
      'plan C',
      execJSON('4', 'third try'),
      verifyJSON(true, [check('attempt-2a', true), check('attempt-2b', true)]),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 2,
    });

    expect(result.status).toBe('success');
    expect(result.answer).toBe('4');
    expect(result.metadata.retries).toBe(2);
    expect(result.metadata.plan).toBe('plan C');
    expect(result.metadata.checks.map((c) => c.check_name)).toEqual([
      'attempt-0',
      'attempt-1',
      'attempt-2a',
      'attempt-2b',
    ]);
    expect(client.calls).toHaveLength(9);
  });

  it('accepts executor output wrapped in markdown fences', async () => {
    const client = createMockClient([
      PLAN,
      '```json\n' + execJSON('4', 'Sum of two and two.') + '\n```',
      verifyJSON(true),
    ]);

    const result = await solve('2+2?', { client, prompts: promptFixture });

    expect(result.status).toBe('success');
    expect(result.answer).toBe('4');
    expect(result.metadata.retries).toBe(0);
  });

  it('accepts executor output fenced with another language tag', async () => {
    const client = createMockClient([
      PLAN,
      '```javascript\n' + execJSON('4', 'Sum of two and two.') + '\n```',
      verifyJSON(true),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 0,
    });

    expect(result.status).toBe('success');
    expect(result.answer).toBe('4');
  });

  it.each([
    ['null', null, 'N=(none)'],
    ['a list', ['carry 1'], 'N=["carry 1"]'],
    ['a number', 51, 'N=51'],
  ])(
    'accepts intermediate notes given as %s',
    async (_label, intermediate, notesLine) => {
      const client = createMockClient([
        PLAN,
        execJSON('4', 'four', intermediate),
        verifyJSON(true),
      ]);

      const result = await solve('2+2?', {
        client,
        prompts: promptFixture,
        maxRetries: 0,
      });

      expect(result.status).toBe('success');
      expect(result.answer).toBe('4');
      expect(result.reasoning_visible_to_user).toBe('four');
      expect(client.calls[2]?.userPrompt).toBe(`Q=2+2? A=4 E=four ${notesLine}`);
    },
  );

  it('completes a passing round through the mock provider', async () => {
    const client = createLLMClient({ provider: 'mock' });

    const result = await solve('2+2?', { client, prompts: promptFixture });

    expect(result).toEqual({
      answer: 'mock answer',
      status: 'success',
      reasoning_visible_to_user: 'Mock provider reply; no model was called.',
      metadata: {
        plan: '1. Restate the question\n2. Answer it directly',
        checks: [
          { check_name: 'mock', passed: true, details: 'Mock provider always passes' },
        ],
        retries: 0,
      },
    });
  });

  it('raises ConfigurationError before any model call when the API key is missing', async () => {
    const fetchSpy = vi.fn();
    vi.stubGlobal('fetch', fetchSpy);

    await expect(
      solve('2+2?', { llmConfig: { provider: 'gemini' }, prompts: promptFixture }),
    ).rejects.toThrow(ConfigurationError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('reads the provider and key from the environment when no gateway is given', async () => {
    vi.stubEnv('LLM_PROVIDER', 'anthropic');
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    await expect(solve('2+2?', { prompts: promptFixture })).rejects.toThrow(
      'ANTHROPIC_API_KEY is required when using the anthropic provider',
    );
  });

  it.each([-1, 1.5, Number.NaN])(
    'rejects maxRetries %s without calling the gateway',
    async (maxRetries) => {
      const client = createMockClient();

      await expect(
        solve('2+2?', { client, prompts: promptFixture, maxRetries }),
      ).rejects.toThrow(ConfigurationError);
      expect(client.calls).toHaveLength(0);
    },
  );

  it('rejects an empty question without calling the gateway', async () => {
    const client = createMockClient();

    await expect(
      solve('   ', { client, prompts: promptFixture }),
    ).rejects.toThrow(ConfigurationError);
    expect(client.calls).toHaveLength(0);
  });

  it.each([0, 1, 2, 3])(
    'makes exactly maxRetries + 1 attempts when verification always fails (maxRetries=%i)',
    async (maxRetries) => {
      const script: string[] = [];
      for (let i = 0; i <= maxRetries; i++) {
        script.push(`plan ${String(i)}`, execJSON(String(i), 'guess'), verifyJSON(false));
      }
      const client = createMockClient(script);

      const result = await solve('2+2?', {
        client,
        prompts: promptFixture,
        maxRetries,
      });

      expect(result.status).toBe('failed');
      expect(result.metadata.retries).toBe(maxRetries);
      expect(result.metadata.checks).toHaveLength(maxRetries + 1);
      expect(client.calls).toHaveLength(3 * (maxRetries + 1));
    },
  );

  it('stops as soon as an attempt passes', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('4', 'four'),
      verifyJSON(true),
      'never used',
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 5,
    });

    expect(result.metadata.retries).toBe(0);
    expect(client.calls).toHaveLength(3);
  });

  it('starts a fresh attempt after malformed executor output', async () => {
    const client = createMockClient([
      PLAN,
      'The answer is 4.',
      'second plan',
      execJSON('4', 'four'),
      verifyJSON(true, [check('second', true)]),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 1,
    });

    expect(result.status).toBe('success');
    expect(result.metadata.retries).toBe(1);
    expect(result.metadata.plan).toBe('second plan');
    expect(result.metadata.checks).toEqual([check('second', true)]);
    expect(client.calls).toHaveLength(5);
  });

  it('treats a verifier reply without "passed" as malformed, not as a failed check', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('4', 'four'),
      JSON.stringify({ checks: [check('arithmetic', true)], issues: '' }),
      PLAN,
      execJSON('4', 'four'),
      verifyJSON(true, [check('retry', true)]),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 1,
    });

    expect(result.status).toBe('success');
    expect(result.metadata.retries).toBe(1);
    // The malformed reply contributed no checks.
    expect(result.metadata.checks).toEqual([check('retry', true)]);
  });

  it('reports the last unverified answer when a malformed check entry ends the last attempt', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('4', 'four'),
      JSON.stringify({ passed: true, checks: [{ check_name: 'arithmetic' }] }),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 0,
    });

    expect(result).toEqual({
      answer: '4',
      status: 'failed',
      reasoning_visible_to_user: 'four',
      metadata: { plan: PLAN, checks: [], retries: 0 },
    });
  });

  it('recovers from a gateway failure in the planner', async () => {
    const client = createMockClient([
      new Error('socket hang up'),
      PLAN,
      execJSON('4', 'four'),
      verifyJSON(true),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 1,
    });

    expect(result.status).toBe('success');
    expect(result.metadata.retries).toBe(1);
    expect(client.calls).toHaveLength(4);
  });

  it('returns a failed result instead of throwing when every call fails', async () => {
    const client = createMockClient([
      new Error('quota exceeded'),
      new Error('quota exceeded'),
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 1,
    });

    expect(result).toEqual({
      answer: '',
      status: 'failed',
      reasoning_visible_to_user: FAILED_REASONING,
      metadata: { plan: '', checks: [], retries: 1 },
    });
  });

  it('uses only the last attempt when it stopped before producing an answer', async () => {
    const client = createMockClient([
      'plan A',
      execJSON('5', 'first guess'),
      verifyJSON(false, [check('arithmetic', false)]),
      'plan B',
      'not json at all',
    ]);

    const result = await solve('2+2?', {
      client,
      prompts: promptFixture,
      maxRetries: 1,
    });

    expect(result).toEqual({
      answer: '',
      status: 'failed',
      reasoning_visible_to_user: FAILED_REASONING,
      metadata: { plan: 'plan B', checks: [check('arithmetic', false)], retries: 1 },
    });
  });

  it('counts a gateway timeout as a failed attempt', async () => {
    let calls = 0;
    const hanging: LLMClient = {
      generate: () => {
        calls++;
        return new Promise<string>(() => undefined);
      },
    };

    const result = await solve('2+2?', {
      client: hanging,
      prompts: promptFixture,
      maxRetries: 1,
      timeoutMs: 10,
    });

    expect(result.status).toBe('failed');
    expect(result.metadata.retries).toBe(1);
    expect(calls).toBe(2);
  });

  it('never exposes intermediate notes in the visible reasoning', async () => {
    const notes = 'scratch: 17 * 3 = 51, carry the one';
    const client = createMockClient([
      PLAN,
      execJSON('51', `Multiply 17 by 3. ${notes}. The product is 51.`, { notes }),
      verifyJSON(true),
    ]);

    const result = await solve('What is 17 times 3?', {
      client,
      prompts: promptFixture,
    });

    expect(result.reasoning_visible_to_user).toBe('Multiply 17 by 3. . The product is 51.');
    expect(result.reasoning_visible_to_user).not.toContain(notes);
  });

  it('regenerates the plan from the question on every attempt', async () => {
    const client = createMockClient([
      'plan A',
      execJSON('5', 'guess'),
      verifyJSON(false),
      'plan B',
      execJSON('4', 'four'),
      verifyJSON(true),
    ]);

    await solve('2+2?', { client, prompts: promptFixture, maxRetries: 1 });

    expect(client.calls[0]?.userPrompt).toBe('Q=2+2?');
    expect(client.calls[3]?.userPrompt).toBe('Q=2+2?');
    expect(client.calls[4]?.userPrompt).toBe('Q=2+2?\nPLAN=plan B');
  });

  it('sends phase-specific generation settings with overrides applied', async () => {
    const client = createMockClient([
      PLAN,
      execJSON('4', 'four'),
      verifyJSON(true),
    ]);

    await solve('2+2?', {
      client,
      prompts: promptFixture,
      phaseParams: { executor: { temperature: 0.5 } },
    });

    expect(client.calls.map((c) => [c.params.temperature, c.params.maxOutputTokens])).toEqual([
      [0.2, 512],
      [0.5, 1024],
      [0, 1024],
    ]);
  });

  it('serves concurrent solves from one gateway without sharing attempt state', async () => {
    const passing: LLMClient = {
      async generate(system, user) {
        if (system === 'PLANNER') return `plan for ${user}`;
        if (system === 'EXECUTOR') {
          const answer = user.startsWith('Q=1+1?') ? '2' : '6';
          return execJSON(answer, `answer ${answer}`);
        }
        return verifyJSON(true);
      },
    };

    const [a, b] = await Promise.all([
      solve('1+1?', { client: passing, prompts: promptFixture }),
      solve('3+3?', { client: passing, prompts: promptFixture }),
    ]);

    expect(a.answer).toBe('2');
    expect(a.metadata.plan).toBe('plan for Q=1+1?');
    expect(b.answer).toBe('6');
    expect(b.metadata.plan).toBe('plan for Q=3+3?');
    expect(a.metadata.checks).toHaveLength(1);
    expect(b.metadata.checks).toHaveLength(1);
  });
});
