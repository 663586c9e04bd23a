/**
 * Tests for ChatGenerator, ChatReviewer, ChatPlanner and OpenAIEmbeddingProvider
 * over a scripted ModelGateway.
 */

import { describe, it, expect, vi, type Mock } from 'vitest'
import { ChatGenerator, unwrapFence } from '../../src/adapters/chat-generator.js'
import { ChatPlanner } from '../../src/adapters/chat-planner.js'
import { ChatReviewer } from '../../src/adapters/chat-reviewer.js'
import { OpenAIEmbeddingProvider } from '../../src/adapters/embedding-provider.js'
import type { CompletionRequest, ModelGateway } from '../../src/adapters/model-gateway.js'
import { GENERATOR_SYSTEM_PROMPT } from '../../src/adapters/prompts.js'
import { PlanInvalidError, TransportError } from '../../src/core/errors.js'

interface FakeGateway extends ModelGateway {
  complete: Mock<(request: CompletionRequest) => Promise<string>>
  embed: Mock<(model: string, input: string) => Promise<number[]>>
}

function fakeGateway(answer: string): FakeGateway {
  return {
    complete: vi.fn((_request: CompletionRequest) => Promise.resolve(answer)),
    embed: vi.fn((_model: string, _input: string) => Promise.resolve([0.5, 0.5])),
  }
}

describe('ChatGenerator', () => {
  it('sends the prompt with the sampling parameters', async () => {
    const gateway = fakeGateway('export const x = 1')
    const generator = new ChatGenerator({ gateway, model: 'coder-model' })

    await expect(generator.generate('Write x', { temperature: 0.3, maxTokens: 256 })).resolves.toBe(
      'export const x = 1',
    )
    expect(gateway.complete).toHaveBeenCalledWith({
      model: 'coder-model',
      messages: [
        { role: 'system', content: GENERATOR_SYSTEM_PROMPT },
        { role: 'user', content: 'Write x' },
      ],
      temperature: 0.3,
      maxTokens: 256,
    })
  })

  it('unwraps an answer enclosed in a single code fence', async () => {
    const generator = new ChatGenerator({ gateway: fakeGateway('```ts\nexport const x = 1\n```\n'), model: 'm' })
    await expect(generator.generate('Write x', { temperature: 0 })).resolves.toBe('export const x = 1')
  })

  it('propagates transport errors', async () => {
    const gateway = fakeGateway('')
    gateway.complete.mockRejectedValue(new TransportError('down'))
    await expect(new ChatGenerator({ gateway, model: 'm' }).generate('p', { temperature: 0 })).rejects.toBeInstanceOf(
      TransportError,
    )
  })
})

describe('unwrapFence', () => {
  it('keeps answers with text outside the fence', () => {
    expect(unwrapFence('Here you go:\n```\ncode\n```')).toBe('Here you go:\n```\ncode\n```')
  })

  it('keeps unfenced answers, trimmed', () => {
    expect(unwrapFence('  plain text \n')).toBe('plain text')
  })
})

describe('ChatReviewer', () => {
  it('reads a JSON verdict and folds suggestions into the feedback', async () => {
    const gateway = fakeGateway(
      'Verdict:\n{"quality_score": 0.6, "feedback": "Missing input checks", "suggestions": ["Validate the email", " "]}',
    )
    const reviewer = new ChatReviewer({ gateway, model: 'review-model' })

    await expect(reviewer.review('Create src/auth.ts', 'code')).resolves.toEqual({
      score: 0.6,
      passed: false,
      feedback: 'Missing input checks\n- Validate the email',
    })
    const request = gateway.complete.mock.calls[0]?.[0]
    expect(request?.temperature).toBe(0.1)
    expect(request?.messages[1]).toEqual({
      role: 'user',
      content: 'Task: Create src/auth.ts\n\nGenerated output:\ncode',
    })
  })

  it('sets passed against its own threshold', async () => {
    const reviewer = new ChatReviewer({
      gateway: fakeGateway('{"quality_score": 0.6, "feedback": "ok"}'),
      model: 'm',
      threshold: 0.5,
    })
    await expect(reviewer.review('r', 'c')).resolves.toEqual({ score: 0.6, passed: true, feedback: 'ok' })
  })

  it('scores an unreadable answer as 0', async () => {
    const reviewer = new ChatReviewer({ gateway: fakeGateway('Looks great to me!'), model: 'm' })
    await expect(reviewer.review('r', 'c')).resolves.toEqual({
      score: 0,
      passed: false,
      feedback:
        'The review could not be read (No structured block mentioning quality_score found). Treating the candidate as failing.',
    })
  })

  it('scores an out-of-range score as unreadable', async () => {
    const reviewer = new ChatReviewer({ gateway: fakeGateway('{"quality_score": 8, "feedback": "good"}'), model: 'm' })
    const judgment = await reviewer.review('r', 'c')
    expect(judgment.score).toBe(0)
    expect(judgment.passed).toBe(false)
  })
})

describe('ChatPlanner', () => {
  const PLAN_ANSWER = [
    'Here is the plan:',
    '```json',
    JSON.stringify({
      summary: 'Add login',
      rationale: 'Handler before tests',
      work_items: [
        { id: 'handler', file_path: 'src/login.ts', description: 'Login handler', tags: ['auth'] },
        {
          id: 'tests',
          file_path: 'test/login.test.ts',
          mode: 'tester',
          description: 'Handler tests',
          dependency_ids: [0],
        },
      ],
    }),
    '```',
  ].join('\n')

  it('parses the plan into work item definitions', async () => {
    const planner = new ChatPlanner({ gateway: fakeGateway(PLAN_ANSWER), model: 'plan-model' })
    const plan = await planner.plan('Add a login endpoint')

    expect(plan.summary).toBe('Add login')
    expect(plan.rationale).toBe('Handler before tests')
    expect(plan.items).toEqual([
      {
        id: 'handler',
        filePath: 'src/login.ts',
        fileStatus: 'new',
        mode: 'coder',
        description: 'Login handler',
        dependencyIds: [],
        tags: ['auth'],
      },
      {
        id: 'tests',
        filePath: 'test/login.test.ts',
        fileStatus: 'new',
        mode: 'tester',
        description: 'Handler tests',
        dependencyIds: [0],
        tags: [],
      },
    ])
  })

  it('raises PlanInvalidError for an answer that is not a plan', async () => {
    const planner = new ChatPlanner({ gateway: fakeGateway('{"work_items": "none"}'), model: 'm' })
    await expect(planner.plan('x')).rejects.toBeInstanceOf(PlanInvalidError)
  })
})

describe('OpenAIEmbeddingProvider', () => {
  it('delegates to the gateway with its model', async () => {
    const gateway = fakeGateway('')
    const provider = new OpenAIEmbeddingProvider(gateway, 'nomic-embed-text')

    expect(provider.name).toBe('openai:nomic-embed-text')
    await expect(provider.embed('hello')).resolves.toEqual([0.5, 0.5])
    expect(gateway.embed).toHaveBeenCalledWith('nomic-embed-text', 'hello')
  })
})
