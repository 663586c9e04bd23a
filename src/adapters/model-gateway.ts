/**
 * ModelGateway: thin seam over an OpenAI-compatible HTTP API.
 *
 * Ollama (`http://localhost:11434/v1`), LM Studio and hosted providers all
 * speak the chat-completions and embeddings protocol. Every failure leaves
 * this module as a TransportError so the core can retry it.
 */

import OpenAI, { APIError } from 'openai'
import { TransportError } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('model-gateway')

/** Local servers ignore the key but the client requires one */
const PLACEHOLDER_API_KEY = 'not-needed'

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string }

export interface CompletionRequest {
  model: string
  messages: ChatMessage[]
  temperature?: number
  maxTokens?: number
}

export interface ModelGateway {
  complete(request: CompletionRequest): Promise<string>
  embed(model: string, input: string): Promise<number[]>
}

export interface OpenAIGatewayOptions {
  /** e.g. http://localhost:11434/v1 */
  baseUrl: string
  apiKey?: string
  /** Per-request timeout */
  timeoutMs?: number
  /** Pre-built client, mainly for tests */
  client?: OpenAI
}

export class OpenAIModelGateway implements ModelGateway {
  private readonly _client: OpenAI
  private readonly _baseUrl: string

  constructor(options: OpenAIGatewayOptions) {
    this._baseUrl = options.baseUrl
    this._client =
      options.client ??
      new OpenAI({
        baseURL: options.baseUrl,
        apiKey: options.apiKey ?? PLACEHOLDER_API_KEY,
        timeout: options.timeoutMs ?? 120_000,
        // retries belong to the iteration controller
        maxRetries: 0,
      })
  }

  async complete(request: CompletionRequest): Promise<string> {
    const startTime = Date.now()
    let content: string | null | undefined
    try {
      const response = await this._client.chat.completions.create({
        model: request.model,
        messages: request.messages,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      })
      content = response.choices[0]?.message.content
    } catch (err) {
      throw this._toTransportError(err, 'chat', request.model)
    }

    if (content === null || content === undefined || content.trim() === '') {
      throw new TransportError(`Model "${request.model}" returned an empty completion`, {
        baseUrl: this._baseUrl,
        model: request.model,
      })
    }
    logger.debug({ model: request.model, durationMs: Date.now() - startTime, chars: content.length }, 'Completion received')
    return content
  }

  async embed(model: string, input: string): Promise<number[]> {
    let embedding: number[] | undefined
    try {
      const response = await this._client.embeddings.create({ model, input, encoding_format: 'float' })
      embedding = response.data[0]?.embedding
    } catch (err) {
      throw this._toTransportError(err, 'embeddings', model)
    }

    if (embedding === undefined || embedding.length === 0) {
      throw new TransportError(`Model "${model}" returned no embedding`, { baseUrl: this._baseUrl, model })
    }
    return embedding
  }

  private _toTransportError(err: unknown, operation: string, model: string): TransportError {
    if (err instanceof TransportError) return err
    const message = err instanceof Error ? err.message : String(err)
    const status = err instanceof APIError ? err.status : undefined
    return new TransportError(`${operation} request to ${this._baseUrl} failed: ${message}`, {
      baseUrl: this._baseUrl,
      model,
      operation,
      ...(status !== undefined ? { status } : {}),
    })
  }
}

export function createModelGateway(options: OpenAIGatewayOptions): ModelGateway {
  return new OpenAIModelGateway(options)
}
