#!/usr/bin/env node
import { stdin, stdout } from 'node:process'
import { createInterface } from 'node:readline'

import { printBanner, promptForBackend, runChatLoop } from './cli/chat-loop.js'
import { createQueuedLineReader, InputClosedError } from './cli/line-reader.js'
import { loadConfig } from './config/load.js'
import { ChatSession } from './core/chat-session.js'
import { createConsoleSink, createFileSink, createLogger, type LogSink } from './core/logger.js'

const FAREWELL = '\nChat session ended by user.'

async function main(): Promise<void> {
  const config = loadConfig()

  const sinks: LogSink[] = [createFileSink(config.chatLog.path)]
  if (config.chatLog.console) sinks.push(createConsoleSink())
  const logger = createLogger(sinks)

  const rl = createInterface({ input: stdin, output: stdout })
  rl.on('SIGINT', () => {
    console.log(FAREWELL)
    process.exit(0)
  })
  const reader = createQueuedLineReader(rl, stdout)
  const print = (line: string): void => console.log(line)

  try {
    const variant = await promptForBackend(reader, print)
    const session = new ChatSession({ variant, config, logger })
    printBanner(session, print)

    await runChatLoop(session, reader, print)
  } catch (error) {
    // End of input (Ctrl+D or a drained pipe) ends the session like an interrupt.
    if (!(error instanceof InputClosedError)) throw error
    console.log(FAREWELL)
  } finally {
    rl.close()
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})
