import type { ChatConfig } from '../src/config/schema.js'
import type { LogPayload, Logger } from '../src/core/types.js'

export function makeConfig(): ChatConfig {
  return {
    openai: { apiKey: 'test-openai-key', model: 'gpt-4o-mini' },
    ollama: { baseUrl: 'http://localhost:11434/v1', apiKey: 'ollama', model: 'llama3.2:8b' },
    gemini: { apiKey: 'test-gemini-key', model: 'gemini-2.5-flash' },
    systemPrompt: 'You are a test assistant.',
    chatLog: { path: '/tmp/chat-test.jsonl', console: false }
  }
}

/** Logger that keeps payloads in call order, tagged with their level. */
export function recordingLogger(): Logger & { records: Array<{ level: string } & LogPayload> } {
  const records: Array<{ level: string } & LogPayload> = []
  return {
    records,
    info(payload) {
      records.push({ level: 'INFO', ...payload })
    },
    error(payload) {
      records.push({ level: 'ERROR', ...payload })
    }
  }
}
