import { config as loadEnv } from 'dotenv'

import { configSchema, type ChatConfig } from './schema.js'

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant that can answer questions and help with task.'

/** Ollama ignores the credential, but the OpenAI client requires one. */
const OLLAMA_PLACEHOLDER_KEY = 'ollama'

/**
 * Loads runtime configuration from `.env` and the environment and validates shape/types.
 * Credentials default to empty strings: a missing key only fails on first request.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
  loadEnv()

  return configSchema.parse({
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini'
    },
    ollama: {
      baseUrl: env.OLLAMA_BASE_URL ?? 'http://localhost:11434/v1',
      apiKey: OLLAMA_PLACEHOLDER_KEY,
      model: env.OLLAMA_MODEL ?? 'llama3.2:8b'
    },
    gemini: {
      apiKey: env.GEMINI_API_KEY ?? '',
      model: env.GEMINI_MODEL ?? 'gemini-2.5-flash'
    },
    systemPrompt: env.CHAT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    chatLog: {
      path: env.CHAT_LOG_PATH ?? `${process.cwd()}/chatbot_logs.jsonl`,
      console: env.CHAT_LOG_CONSOLE !== 'false'
    }
  })
}
