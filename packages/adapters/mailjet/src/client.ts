import { z } from 'zod'
import { basicAuth, JsonHttpClient, parseEnv, type FetchLike, type Logger } from '@herald/core'

export const DEFAULT_MAILJET_BASE_URL = 'https://api.mailjet.com'

export const MailjetEnv = z.object({
  MAILJET_API_KEY_PUBLIC: z.string().min(1).optional(),
  MAILJET_API_KEY_PRIVATE: z.string().min(1).optional(),
  MAILJET_API_TOKEN: z.string().min(1).optional(),
  MAILJET_BASE_URL: z.string().url().default(DEFAULT_MAILJET_BASE_URL),
})

export type MailjetTransportOptions = {
  baseUrl?: string
  timeoutMs?: number
  fetch?: FetchLike
  logger?: Logger
}

export function readMailjetEnv(env: Record<string, string | undefined> = process.env) {
  return parseEnv(MailjetEnv, env)
}

// v3 endpoints authenticate with the key pair
export function makeAuthClient(apiKeyPublic: string, apiKeyPrivate: string, options: MailjetTransportOptions): JsonHttpClient {
  return new JsonHttpClient({
    baseUrl: options.baseUrl ?? DEFAULT_MAILJET_BASE_URL,
    headers: { Authorization: basicAuth(apiKeyPublic, apiKeyPrivate) },
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
  })
}

// v4 (SMS) endpoints take a bearer token
export function makeBearerClient(apiToken: string, options: MailjetTransportOptions): JsonHttpClient {
  return new JsonHttpClient({
    baseUrl: options.baseUrl ?? DEFAULT_MAILJET_BASE_URL,
    headers: { Authorization: `Bearer ${apiToken}` },
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
  })
}
