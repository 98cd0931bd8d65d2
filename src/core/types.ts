export type Role = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  role: Role
  content: string
}

/** Closed set of backends: Ollama (local), OpenAI (completion), Gemini (generative). */
export type BackendVariant = 'openai' | 'ollama' | 'gemini'

export type LogLevel = 'INFO' | 'ERROR'

export interface UserInputPayload {
  type: 'user_input'
  metadata: {
    user_id: string
    session_id: string
    model: string
  }
}

export interface ModelResponsePayload {
  type: 'model_response'
  model_response: string
  metadata: {
    session_id: string
    model: string
    /** Seconds between dispatch and reply. */
    response_time: number
    tokens_used: number | null
  }
}

export interface ErrorPayload {
  type: 'error'
  error_message: string
  metadata: {
    session_id: string
    model: string
    user_id: string
  }
}

export type LogPayload = UserInputPayload | ModelResponsePayload | ErrorPayload

export type LogRecord = { timestamp: string; level: LogLevel } & LogPayload

export interface Logger {
  info(payload: UserInputPayload | ModelResponsePayload): void
  error(payload: ErrorPayload): void
}
