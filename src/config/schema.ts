import { z } from 'zod'

export const configSchema = z.object({
  openai: z.object({
    apiKey: z.string(),
    model: z.string().min(1)
  }),
  ollama: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().min(1),
    model: z.string().min(1)
  }),
  gemini: z.object({
    apiKey: z.string(),
    model: z.string().min(1)
  }),
  systemPrompt: z.string().min(1),
  chatLog: z.object({
    path: z.string().min(1),
    console: z.boolean()
  })
})

export type ChatConfig = z.infer<typeof configSchema>
