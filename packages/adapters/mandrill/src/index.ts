import { z } from 'zod'
import {
  encodeAttachment,
  filterHeaders,
  headerBlacklist,
  HttpTransportError,
  JsonHttpClient,
  parseAddress,
  parseEnv,
  type EmailBackend,
  type FetchLike,
  type JsonResponse,
  type Logger,
  type RenderedEmail,
} from '@herald/core'

export const DEFAULT_MANDRILL_BASE_URL = 'https://mandrillapp.com'

export const MANDRILL_HEADERS_BLACKLIST = headerBlacklist([
  'From',
  'Sender',
  'Subject',
  'To',
  'Cc',
  'Bcc',
  'Return-Path',
  'Delivered-To',
  'DKIM-Signature',
  'DomainKey-Status',
  'Received-SPF',
  'Authentication-Results',
  'Received',
  'User-Agent',
  'List-Id',
  'Date',
  'X-CSA-Complaints',
  'Message-Id',
])

export const MandrillEnv = z.object({
  MANDRILL_API_KEY: z.string().min(1, 'MANDRILL_API_KEY is required for Mandrill'),
  MANDRILL_BASE_URL: z.string().url().default(DEFAULT_MANDRILL_BASE_URL),
})

export type RecipientType = 'to' | 'cc' | 'bcc'

export type MandrillRecipient = { email: string; type: RecipientType; name?: string }

export type MandrillAttachment = { name: string; type: string; content: string }

export type MandrillMessage = {
  from_email: string
  from_name?: string
  to: MandrillRecipient[]
  subject: string
  text?: string
  html?: string
  attachments?: MandrillAttachment[]
  headers?: Record<string, string>
}

const SendOutput = z.array(
  z
    .object({
      email: z.string(),
      status: z.string(),
      reject_reason: z.string().nullish(),
      _id: z.string().optional(),
    })
    .passthrough()
)

export function toMandrillRecipient(raw: string, type: RecipientType): MandrillRecipient {
  const { address, name } = parseAddress(raw)
  return name ? { email: address, type, name } : { email: address, type }
}

export function makeMandrillMessage(email: RenderedEmail): MandrillMessage {
  const from = parseAddress(email.from)
  const out: MandrillMessage = {
    from_email: from.address,
    ...(from.name ? { from_name: from.name } : {}),
    to: [
      ...email.to.map((r) => toMandrillRecipient(r, 'to')),
      ...email.cc.map((r) => toMandrillRecipient(r, 'cc')),
      ...email.bcc.map((r) => toMandrillRecipient(r, 'bcc')),
    ],
    subject: email.subject,
  }
  if (email.text) out.text = email.text
  if (email.html) out.html = email.html
  if (email.attachments.length > 0) {
    out.attachments = email.attachments.map(encodeAttachment).map((a) => ({ name: a.filename, type: a.contentType, content: a.base64 }))
  }
  const headers = filterHeaders(email.headers, MANDRILL_HEADERS_BLACKLIST)
  if (Object.keys(headers).length > 0) out.headers = headers
  return out
}

export type MandrillEmailBackendOptions = {
  apiKey: string
  baseUrl?: string
  timeoutMs?: number
  fetch?: FetchLike
  logger?: Logger
}

/**
 * One call to /api/1.0/messages/send per message. A message counts as
 * delivered only when every recipient comes back as "sent".
 */
export class MandrillEmailBackend implements EmailBackend {
  private readonly client: JsonHttpClient
  private readonly logger: Logger

  constructor(private readonly options: MandrillEmailBackendOptions) {
    // The key travels in the body, so the client carries no credentials
    this.client = new JsonHttpClient({
      baseUrl: options.baseUrl ?? DEFAULT_MANDRILL_BASE_URL,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    })
    this.logger = options.logger ?? console
  }

  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: Omit<MandrillEmailBackendOptions, 'apiKey'> = {}
  ): MandrillEmailBackend {
    const e = parseEnv(MandrillEnv, env)
    return new MandrillEmailBackend({ baseUrl: e.MANDRILL_BASE_URL, ...options, apiKey: e.MANDRILL_API_KEY })
  }

  async send(messages: RenderedEmail[]): Promise<number> {
    let done = 0
    for (const message of messages) {
      if (await this.sendOne(makeMandrillMessage(message))) done++
    }
    return done
  }

  private async sendOne(message: MandrillMessage): Promise<boolean> {
    let response: JsonResponse
    try {
      response = await this.client.post('/api/1.0/messages/send', { key: this.options.apiKey, message })
    } catch (e) {
      if (!(e instanceof HttpTransportError)) throw e
      this.logger.warn(`[herald] mandrill: ${e.message}`)
      return false
    }
    const output = SendOutput.safeParse(response.body)
    if (!response.ok || !output.success) {
      this.logger.warn(`[herald] mandrill: HTTP ${response.status}`)
      return false
    }
    const rejected = output.data.filter((r) => r.status !== 'sent')
    for (const r of rejected) {
      this.logger.warn(`[herald] mandrill: ${r.email} ${r.status}${r.reject_reason ? ` (${r.reject_reason})` : ''}`)
    }
    return rejected.length === 0
  }
}
