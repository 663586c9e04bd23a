/**
 * Tests for OpenAIModelGateway against an in-process HTTP stand-in for an
 * OpenAI-compatible server.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest'
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { OpenAIModelGateway } from '../../src/adapters/model-gateway.js'
import { TransportError } from '../../src/core/errors.js'

interface RecordedRequest {
  method: string | undefined
  url: string | undefined
  body: unknown
}

type Responder = (req: RecordedRequest) => { status: number; body: unknown }

let server: Server
let baseUrl: string
let requests: RecordedRequest[]
let responder: Responder

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = ''
    req.setEncoding('utf8')
    req.on('data', (chunk: string) => {
      data += chunk
    })
    req.on('end', () => resolve(data))
    req.on('error', reject)
  })
}

function handle(req: IncomingMessage, res: ServerResponse): void {
  readBody(req)
    .then((raw) => {
      const recorded: RecordedRequest = {
        method: req.method,
        url: req.url,
        body: raw === '' ? null : JSON.parse(raw),
      }
      requests.push(recorded)
      const { status, body } = responder(recorded)
      res.writeHead(status, { 'content-type': 'application/json' })
      res.end(JSON.stringify(body))
    })
    .catch((err: unknown) => {
      res.writeHead(500)
      res.end(String(err))
    })
}

function completion(content: string | null): unknown {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
  }
}

beforeAll(async () => {
  server = createServer(handle)
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('server did not bind a port')
  baseUrl = `http://127.0.0.1:${String(address.port)}/v1`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
})

beforeEach(() => {
  requests = []
  responder = () => ({ status: 200, body: completion('hello') })
})

describe('OpenAIModelGateway.complete', () => {
  it('posts a chat completion and returns the message content', async () => {
    const gateway = new OpenAIModelGateway({ baseUrl, apiKey: 'test-key' })
    const content = await gateway.complete({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.2,
      maxTokens: 64,
    })

    expect(content).toBe('hello')
    expect(requests).toHaveLength(1)
    expect(requests[0]?.method).toBe('POST')
    expect(requests[0]?.url).toBe('/v1/chat/completions')
    expect(requests[0]?.body).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.2,
      max_tokens: 64,
    })
  })

  it('omits unset sampling parameters', async () => {
    const gateway = new OpenAIModelGateway({ baseUrl })
    await gateway.complete({ model: 'test-model', messages: [{ role: 'user', content: 'hi' }] })
    expect(requests[0]?.body).toEqual({ model: 'test-model', messages: [{ role: 'user', content: 'hi' }] })
  })

  it('wraps HTTP errors in TransportError with the status', async () => {
    responder = () => ({ status: 503, body: { error: { message: 'model loading' } } })
    const gateway = new OpenAIModelGateway({ baseUrl })

    let caught: unknown
    try {
      await gateway.complete({ model: 'test-model', messages: [{ role: 'user', content: 'hi' }] })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(TransportError)
    if (caught instanceof TransportError) {
      expect(caught.context.status).toBe(503)
      expect(caught.context.operation).toBe('chat')
    }
    // no client-side retries
    expect(requests).toHaveLength(1)
  })

  it('treats an empty completion as a transport failure', async () => {
    responder = () => ({ status: 200, body: completion(null) })
    const gateway = new OpenAIModelGateway({ baseUrl })
    await expect(
      gateway.complete({ model: 'test-model', messages: [{ role: 'user', content: 'hi' }] }),
    ).rejects.toThrow('Model "test-model" returned an empty completion')
  })
})

describe('OpenAIModelGateway.embed', () => {
  it('requests float embeddings and returns the first vector', async () => {
    responder = () => ({
      status: 200,
      body: {
        object: 'list',
        model: 'embed-model',
        data: [{ object: 'embedding', index: 0, embedding: [0.25, -0.5, 1] }],
        usage: { prompt_tokens: 1, total_tokens: 1 },
      },
    })
    const gateway = new OpenAIModelGateway({ baseUrl })

    await expect(gateway.embed('embed-model', 'some text')).resolves.toEqual([0.25, -0.5, 1])
    expect(requests[0]?.url).toBe('/v1/embeddings')
    expect(requests[0]?.body).toEqual({ model: 'embed-model', input: 'some text', encoding_format: 'float' })
  })

  it('rejects a response without vectors', async () => {
    responder = () => ({ status: 200, body: { object: 'list', model: 'embed-model', data: [] } })
    const gateway = new OpenAIModelGateway({ baseUrl })
    await expect(gateway.embed('embed-model', 'x')).rejects.toBeInstanceOf(TransportError)
  })
})
