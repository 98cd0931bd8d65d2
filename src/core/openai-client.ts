import OpenAI from 'openai'

import type { ModelClient, TurnReply } from './model-client.js'
import type { ChatMessage } from './types.js'

export interface OpenAIChatClientOptions {
  apiKey: string
  model: string
  /** Set for OpenAI-compatible servers such as Ollama. */
  baseURL?: string
}

/**
 * Chat-completions backend. Serves both the OpenAI API and a local Ollama
 * server through its OpenAI-compatible endpoint. Every turn carries the whole
 * conversation history.
 */
export class OpenAIChatClient implements ModelClient {
  private client: OpenAI | null = null

  constructor(private readonly options: OpenAIChatClientOptions) {}

  async sendTurn(history: readonly ChatMessage[]): Promise<TurnReply> {
    const response = await this.getClient().chat.completions.create({
      model: this.options.model,
      messages: history.map((message) => ({ role: message.role, content: message.content }))
    })

    const choice = response.choices[0]
    if (!choice) {
      throw new Error('Completion response contained no choices')
    }
    const text = choice.message.content
    if (text === null) {
      throw new Error('Completion response contained no message content')
    }

    return { text, tokensUsed: response.usage?.total_tokens ?? null }
  }

  // Built on first use so a missing credential fails the request, not startup.
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseURL })
    }
    return this.client
  }
}
