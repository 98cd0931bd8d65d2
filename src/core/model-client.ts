import type { ChatMessage } from './types.js'

export interface TurnReply {
  text: string
  /** Total tokens billed for the turn, when the backend reports usage. */
  tokensUsed: number | null
}

/**
 * Uniform contract every backend implements for a single conversational turn.
 * `history` already ends with the user message for `input`.
 */
export interface ModelClient {
  sendTurn(history: readonly ChatMessage[], input: string): Promise<TurnReply>
}
