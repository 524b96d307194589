import { z } from 'zod'
import { loadConfig, parseEnv, type EmailBackend, type FetchLike, type Logger, type SmsBackend } from '@herald/core'
import { MailjetEmailBackend, MailjetSmsBackend } from '@herald/mailjet'
import { MandrillEmailBackend } from '@herald/mandrill'
import { FakeEmailBackend, FakeSmsBackend } from '@herald/messaging-fake'
import { TwilioSmsBackend } from '@herald/messaging-twilio'

export const BackendEnv = z.object({
  HERALD_EMAIL_BACKEND: z.enum(['mailjet', 'mandrill', 'memory']).default('memory'),
  HERALD_SMS_BACKEND: z.enum(['mailjet', 'twilio', 'memory']).default('memory'),
})

export type Backends = { email: EmailBackend; sms: SmsBackend }

/** Provider backends named by the environment; in-memory outboxes otherwise. */
export function backendsFromEnv(
  env: Record<string, string | undefined> = process.env,
  extras: { fetch?: FetchLike; logger?: Logger } = {}
): Backends {
  const e = parseEnv(BackendEnv, env)
  const transport = { ...extras, timeoutMs: loadConfig(env).httpTimeoutMs }

  const email: EmailBackend =
    e.HERALD_EMAIL_BACKEND === 'mailjet'
      ? MailjetEmailBackend.fromEnv(env, transport)
      : e.HERALD_EMAIL_BACKEND === 'mandrill'
        ? MandrillEmailBackend.fromEnv(env, transport)
        : new FakeEmailBackend()

  const sms: SmsBackend =
    e.HERALD_SMS_BACKEND === 'mailjet'
      ? MailjetSmsBackend.fromEnv(env, transport)
      : e.HERALD_SMS_BACKEND === 'twilio'
        ? TwilioSmsBackend.fromEnv(env, extras.logger)
        : new FakeSmsBackend()

  return { email, sms }
}
