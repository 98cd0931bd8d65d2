import { resolveVariantFromChoice } from '../core/client-factory.js'
import type { BackendVariant } from '../core/types.js'

/** The slice of `readline/promises` the loops need. */
export interface LineReader {
  question(query: string): Promise<string>
}

export type Print = (line: string) => void

export const MENU_LINES = ['1. OpenAI GPT-4', '2. Ollama Llama 3.2', '3. Google Gemini']

/** Asks until the answer is exactly 1, 2 or 3. */
export async function promptForBackend(reader: LineReader, print: Print): Promise<BackendVariant> {
  print('\nSelect Model Type:')
  for (const line of MENU_LINES) print(line)

  for (;;) {
    const choice = (await reader.question('enter choice (1, 2, or 3): ')).trim()
    const variant = resolveVariantFromChoice(choice)
    if (variant) return variant
    print('Please enter 1, 2, or 3')
  }
}

export function printBanner(session: { sessionId: string; label: string }, print: Print): void {
  print('\n===Chat Session Started===')
  print(`Using ${session.label} model`)
  print("Type 'exit' to end the conversation\n")
  print(`Session ID: ${session.sessionId}`)
}

/** Reads turns until the user types `exit`; blank lines are skipped. */
export async function runChatLoop(
  session: { send(input: string): Promise<string> },
  reader: LineReader,
  print: Print
): Promise<void> {
  for (;;) {
    const input = (await reader.question('You: ')).trim()

    if (input.toLowerCase() === 'exit') {
      print('Goodbye!')
      return
    }
    if (!input) continue

    const reply = await session.send(input)
    print(`Bot: ${reply}\n`)
  }
}
