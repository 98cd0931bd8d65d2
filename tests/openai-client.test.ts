import { beforeEach, describe, expect, it, vi } from 'vitest'

const mocks = vi.hoisted(() => ({ construct: vi.fn(), create: vi.fn() }))

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.create } }
    constructor(options: unknown) {
      mocks.construct(options)
    }
  }
}))

import { OpenAIChatClient } from '../src/core/openai-client.js'
import type { ChatMessage } from '../src/core/types.js'

const history: ChatMessage[] = [
  { role: 'system', content: 'sys' },
  { role: 'user', content: 'first' },
  { role: 'assistant', content: 'reply' },
  { role: 'user', content: 'second' }
]

describe('OpenAIChatClient', () => {
  beforeEach(() => {
    mocks.construct.mockReset()
    mocks.create.mockReset()
  })

  it('sends the full history and returns the first choice', async () => {
    mocks.create.mockResolvedValue({
      choices: [{ message: { content: 'answer' } }, { message: { content: 'ignored' } }],
      usage: { total_tokens: 42 }
    })
    const client = new OpenAIChatClient({ apiKey: 'test-key', model: 'gpt-4o-mini' })

    const reply = await client.sendTurn(history)

    expect(reply).toEqual({ text: 'answer', tokensUsed: 42 })
    expect(mocks.create).toHaveBeenCalledWith({ model: 'gpt-4o-mini', messages: history })
  })

  it('reports null tokens when usage is missing', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] })
    const client = new OpenAIChatClient({ apiKey: 'ollama', model: 'llama3.2:8b' })

    expect(await client.sendTurn(history)).toEqual({ text: 'ok', tokensUsed: null })
  })

  it('builds the SDK client lazily, once', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] })
    const client = new OpenAIChatClient({
      apiKey: 'ollama',
      model: 'llama3.2:8b',
      baseURL: 'http://localhost:11434/v1'
    })
    expect(mocks.construct).not.toHaveBeenCalled()

    await client.sendTurn(history)
    await client.sendTurn(history)

    expect(mocks.construct).toHaveBeenCalledTimes(1)
    expect(mocks.construct).toHaveBeenCalledWith({
      apiKey: 'ollama',
      baseURL: 'http://localhost:11434/v1'
    })
  })

  it('rejects a response without choices', async () => {
    mocks.create.mockResolvedValue({ choices: [] })
    const client = new OpenAIChatClient({ apiKey: 'test-key', model: 'gpt-4o-mini' })

    await expect(client.sendTurn(history)).rejects.toThrow('Completion response contained no choices')
  })

  it('rejects a choice without content', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: null } }] })
    const client = new OpenAIChatClient({ apiKey: 'test-key', model: 'gpt-4o-mini' })

    await expect(client.sendTurn(history)).rejects.toThrow(
      'Completion response contained no message content'
    )
  })
})
