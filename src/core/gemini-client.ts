import { GoogleGenAI } from '@google/genai'

import type { ModelClient, TurnReply } from './model-client.js'
import type { ChatMessage } from './types.js'

export interface GeminiChatClientOptions {
  apiKey: string
  model: string
}

/**
 * Generative-model backend. Each turn opens a new chat with no prior history,
 * so Gemini never sees earlier turns; only the local history accumulates.
 * Usage is not reported.
 */
export class GeminiChatClient implements ModelClient {
  private client: GoogleGenAI | null = null

  constructor(private readonly options: GeminiChatClientOptions) {}

  async sendTurn(_history: readonly ChatMessage[], input: string): Promise<TurnReply> {
    const chat = this.getClient().chats.create({ model: this.options.model, history: [] })
    const response = await chat.sendMessage({ message: input })

    const text = response.text
    if (text === undefined) {
      throw new Error('Gemini response contained no text')
    }
    return { text, tokensUsed: null }
  }

  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.options.apiKey })
    }
    return this.client
  }
}
