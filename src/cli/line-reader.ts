import type { Interface } from 'node:readline'

import type { LineReader } from './chat-loop.js'

/** Raised by `question()` once input has ended and every buffered line was read. */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed')
    this.name = 'InputClosedError'
  }
}

interface Waiter {
  resolve(line: string): void
  reject(error: Error): void
}

/**
 * Adapts a readline interface to `LineReader`. Lines that arrive while no
 * question is pending (piped input, typing during a slow reply) are queued
 * and handed out in order.
 */
export function createQueuedLineReader(rl: Interface, output: NodeJS.WritableStream): LineReader {
  const buffered: string[] = []
  const waiting: Waiter[] = []
  let closed = false

  rl.on('line', (line: string) => {
    const waiter = waiting.shift()
    if (waiter) waiter.resolve(line)
    else buffered.push(line)
  })
  rl.on('close', () => {
    closed = true
    for (const waiter of waiting.splice(0)) waiter.reject(new InputClosedError())
  })

  return {
    question(query) {
      if (closed) {
        output.write(query)
      } else {
        rl.setPrompt(query)
        rl.prompt()
      }

      const line = buffered.shift()
      if (line !== undefined) return Promise.resolve(line)
      if (closed) return Promise.reject(new InputClosedError())
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject })
      })
    }
  }
}
