import { z } from 'zod'
import { ConfigurationError } from './errors'
import { isPhone } from './phone'

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'))

const list = z
  .string()
  .optional()
  .transform((v) => (v ? v.split(',').map((s) => s.trim()).filter(Boolean) : []))

export const HeraldEnv = z.object({
  HERALD_BASE_URL: z.string().url().optional(),
  HERALD_SITE_ID: z.string().min(1).optional(),
  HERALD_DEFAULT_FROM_EMAIL: z.string().min(1).default('webmaster@localhost'),
  HERALD_SMS_SENDERS: list.refine((numbers) => numbers.every(isPhone), 'must list phone numbers in international format'),
  HERALD_DEFAULT_LOCALE: z.string().min(2).default('en'),
  HERALD_PRESERVE_INTERNAL_LINKS: flag(true),
  HERALD_PRESERVE_INLINE_IMAGES: flag(true),
  HERALD_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export type HeraldConfig = {
  baseUrl?: string
  siteId?: string
  defaultFromEmail: string
  smsSenders: string[]
  defaultLocale: string
  preserveInternalLinks: boolean
  preserveInlineImages: boolean
  httpTimeoutMs?: number
}

export function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Record<string, string | undefined>): z.infer<T> {
  const parsed = schema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

export function loadConfig(env: Record<string, string | undefined> = process.env): HeraldConfig {
  const e = parseEnv(HeraldEnv, env)
  return {
    baseUrl: e.HERALD_BASE_URL,
    siteId: e.HERALD_SITE_ID,
    defaultFromEmail: e.HERALD_DEFAULT_FROM_EMAIL,
    smsSenders: e.HERALD_SMS_SENDERS,
    defaultLocale: e.HERALD_DEFAULT_LOCALE,
    preserveInternalLinks: e.HERALD_PRESERVE_INTERNAL_LINKS,
    preserveInlineImages: e.HERALD_PRESERVE_INLINE_IMAGES,
    httpTimeoutMs: e.HERALD_HTTP_TIMEOUT_MS,
  }
}

export function defineConfig(overrides: Partial<HeraldConfig> = {}): HeraldConfig {
  return { ...loadConfig({}), ...overrides }
}
