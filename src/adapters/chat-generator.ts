/**
 * ChatGenerator: Generator backed by a chat-completions model.
 */

import type { SamplingParams } from '../core/types.js'
import type { ModelGateway } from './model-gateway.js'
import { GENERATOR_SYSTEM_PROMPT } from './prompts.js'
import type { Generator } from './types.js'

const WHOLE_FENCE = /^```[\w.+-]*[^\S\n]*\n([\s\S]*?)\n?```$/

export interface ChatGeneratorOptions {
  gateway: ModelGateway
  model: string
  systemPrompt?: string
}

export class ChatGenerator implements Generator {
  private readonly _gateway: ModelGateway
  private readonly _model: string
  private readonly _systemPrompt: string

  constructor(options: ChatGeneratorOptions) {
    this._gateway = options.gateway
    this._model = options.model
    this._systemPrompt = options.systemPrompt ?? GENERATOR_SYSTEM_PROMPT
  }

  async generate(prompt: string, sampling: SamplingParams): Promise<string> {
    const output = await this._gateway.complete({
      model: this._model,
      messages: [
        { role: 'system', content: this._systemPrompt },
        { role: 'user', content: prompt },
      ],
      temperature: sampling.temperature,
      maxTokens: sampling.maxTokens,
    })
    return unwrapFence(output)
  }
}

/** Strip a code fence that encloses the entire answer */
export function unwrapFence(output: string): string {
  const trimmed = output.trim()
  const match = WHOLE_FENCE.exec(trimmed)
  return match?.[1] ?? trimmed
}
