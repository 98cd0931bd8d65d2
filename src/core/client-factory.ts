import type { ChatConfig } from '../config/schema.js'
import { GeminiChatClient } from './gemini-client.js'
import type { ModelClient } from './model-client.js'
import { OpenAIChatClient } from './openai-client.js'
import type { BackendVariant } from './types.js'

export interface BackendSelection {
  variant: BackendVariant
  client: ModelClient
  /** Model identifier sent to the backend and written to every log record. */
  modelName: string
  /** Short provider name shown in the session banner. */
  label: string
}

export type BackendSelector = (variant: BackendVariant, config: ChatConfig) => BackendSelection

const CHOICES: Record<string, BackendVariant> = {
  '1': 'openai',
  '2': 'ollama',
  '3': 'gemini'
}

/** Maps a menu answer to a backend, or `null` for anything but 1, 2 or 3. */
export function resolveVariantFromChoice(choice: string): BackendVariant | null {
  return Object.hasOwn(CHOICES, choice) ? CHOICES[choice] : null
}

export const selectBackend: BackendSelector = (variant, config) => {
  if (variant === 'gemini') {
    return {
      variant,
      client: new GeminiChatClient({ apiKey: config.gemini.apiKey, model: config.gemini.model }),
      modelName: config.gemini.model,
      label: 'Gemini'
    }
  }
  if (variant === 'ollama') {
    return {
      variant,
      client: new OpenAIChatClient({
        apiKey: config.ollama.apiKey,
        model: config.ollama.model,
        baseURL: config.ollama.baseUrl
      }),
      modelName: config.ollama.model,
      label: 'Ollama'
    }
  }
  return {
    variant: 'openai',
    client: new OpenAIChatClient({ apiKey: config.openai.apiKey, model: config.openai.model }),
    modelName: config.openai.model,
    label: 'OpenAI'
  }
}
