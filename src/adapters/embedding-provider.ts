/**
 * EmbeddingProvider backed by an OpenAI-compatible embeddings endpoint.
 */

import type { EmbeddingProvider } from '../modules/retrieval/index.js'
import type { ModelGateway } from './model-gateway.js'

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string
  private readonly _gateway: ModelGateway
  private readonly _model: string

  constructor(gateway: ModelGateway, model: string) {
    this._gateway = gateway
    this._model = model
    this.name = `openai:${model}`
  }

  embed(text: string): Promise<number[]> {
    return this._gateway.embed(this._model, text)
  }
}
