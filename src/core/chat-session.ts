import { randomUUID } from 'node:crypto'

import type { ChatConfig } from '../config/schema.js'
import { selectBackend, type BackendSelector } from './client-factory.js'
import type { ModelClient } from './model-client.js'
import type { BackendVariant, ChatMessage, Logger } from './types.js'

export interface ChatSessionOptions {
  variant: BackendVariant
  config: ChatConfig
  logger: Logger
  selectBackend?: BackendSelector
}

export const APOLOGY_PREFIX = 'Sorry, something evil happened in the universe: '

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * One conversation against one backend. History starts with the system
 * instruction and is only ever appended to.
 */
export class ChatSession {
  readonly sessionId = randomUUID()
  readonly userId = randomUUID()
  readonly variant: BackendVariant
  readonly modelName: string
  readonly label: string

  private readonly client: ModelClient
  private readonly logger: Logger
  private readonly messages: ChatMessage[]

  constructor(options: ChatSessionOptions) {
    const select = options.selectBackend ?? selectBackend
    const selection = select(options.variant, options.config)
    this.variant = selection.variant
    this.client = selection.client
    this.modelName = selection.modelName
    this.label = selection.label
    this.logger = options.logger
    this.messages = [{ role: 'system', content: options.config.systemPrompt }]
  }

  get history(): readonly ChatMessage[] {
    return this.messages.map((message) => ({ ...message }))
  }

  /**
   * Runs one turn and returns the reply. Never rejects: failures are logged and
   * returned as an apology. The user message stays in history after a failure.
   */
  async send(input: string): Promise<string> {
    try {
      this.logger.info({
        type: 'user_input',
        metadata: { user_id: this.userId, session_id: this.sessionId, model: this.modelName }
      })

      this.messages.push({ role: 'user', content: input })

      const startedAt = Date.now()
      const reply = await this.client.sendTurn([...this.messages], input)
      const responseTime = (Date.now() - startedAt) / 1000

      this.logger.info({
        type: 'model_response',
        model_response: reply.text,
        metadata: {
          session_id: this.sessionId,
          model: this.modelName,
          response_time: responseTime,
          tokens_used: reply.tokensUsed
        }
      })

      this.messages.push({ role: 'assistant', content: reply.text })
      return reply.text
    } catch (error) {
      const message = describeError(error)
      try {
        this.logger.error({
          type: 'error',
          error_message: message,
          metadata: { session_id: this.sessionId, model: this.modelName, user_id: this.userId }
        })
      } catch (logError) {
        console.error(`Failed to write error record: ${describeError(logError)}`)
      }
      return `${APOLOGY_PREFIX}${message}`
    }
  }
}
