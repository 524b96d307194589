import { z } from 'zod'
import {
  ConfigurationError,
  encodeAttachment,
  filterHeaders,
  headerBlacklist,
  HttpTransportError,
  parseAddress,
  type EmailBackend,
  type JsonHttpClient,
  type JsonResponse,
  type Logger,
  type RenderedEmail,
} from '@herald/core'
import { makeAuthClient, readMailjetEnv, type MailjetTransportOptions } from './client'

export const MAILJET_HEADERS_BLACKLIST = headerBlacklist([
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
  'X-Mailjet-Prio',
  'X-Mailjet-Debug',
  'User-Agent',
  'X-Mailer',
  'X-MJ-CustomID',
  'X-MJ-EventPayload',
  'X-MJ-Vars',
  'X-MJ-TemplateErrorDeliver',
  'X-MJ-TemplateErrorReporting',
  'X-MJ-TemplateLanguage',
  'X-Mailjet-TrackOpen',
  'X-Mailjet-TrackClick',
  'X-MJ-TemplateID',
  'X-MJ-WorkflowID',
  'X-Feedback-Id',
  'X-Mailjet-Segmentation',
  'List-Id',
  'X-MJ-MID',
  'X-MJ-ErrorMessage',
  'Date',
  'X-CSA-Complaints',
  'Message-Id',
  'X-Mailjet-Campaign',
  'X-MJ-StatisticsContactsListID',
])

export type MailjetAddress = { Email: string; Name?: string }

export type MailjetAttachment = { Filename: string; ContentType: string; Base64Content: string }

export type MailjetMessage = {
  From: MailjetAddress
  To: MailjetAddress[]
  Cc?: MailjetAddress[]
  Bcc?: MailjetAddress[]
  Subject: string
  TextPart?: string
  HTMLPart?: string
  Attachments?: MailjetAttachment[]
  Headers?: Record<string, string>
}

const SendEmailOutput = z.object({
  Messages: z.array(z.object({ Status: z.string() }).passthrough()),
})

export function toMailjetAddress(raw: string): MailjetAddress {
  const { address, name } = parseAddress(raw)
  return name ? { Email: address, Name: name } : { Email: address }
}

export function makeMailjetMessage(email: RenderedEmail): MailjetMessage {
  const out: MailjetMessage = {
    From: toMailjetAddress(email.from),
    To: email.to.map(toMailjetAddress),
    Subject: email.subject,
  }
  if (email.text) out.TextPart = email.text
  if (email.html) out.HTMLPart = email.html
  if (email.cc.length > 0) out.Cc = email.cc.map(toMailjetAddress)
  if (email.bcc.length > 0) out.Bcc = email.bcc.map(toMailjetAddress)
  if (email.attachments.length > 0) {
    out.Attachments = email.attachments.map(encodeAttachment).map((a) => ({
      Filename: a.filename,
      ContentType: a.contentType,
      Base64Content: a.base64,
    }))
  }
  const headers = filterHeaders(email.headers, MAILJET_HEADERS_BLACKLIST)
  if (Object.keys(headers).length > 0) out.Headers = headers
  return out
}

export type MailjetEmailBackendOptions = MailjetTransportOptions & {
  apiKeyPublic: string
  apiKeyPrivate: string
}

/**
 * Sends a whole batch in one call to /v3.1/send. The count is the number of
 * messages Mailjet reports as "success"; any HTTP failure counts as zero.
 */
export class MailjetEmailBackend implements EmailBackend {
  private readonly client: JsonHttpClient
  private readonly logger: Logger

  constructor(options: MailjetEmailBackendOptions) {
    this.client = makeAuthClient(options.apiKeyPublic, options.apiKeyPrivate, options)
    this.logger = options.logger ?? console
  }

  static fromEnv(env: Record<string, string | undefined> = process.env, options: MailjetTransportOptions = {}): MailjetEmailBackend {
    const e = readMailjetEnv(env)
    if (!e.MAILJET_API_KEY_PUBLIC || !e.MAILJET_API_KEY_PRIVATE) {
      throw new ConfigurationError('MAILJET_API_KEY_PUBLIC and MAILJET_API_KEY_PRIVATE are required for Mailjet email')
    }
    return new MailjetEmailBackend({
      baseUrl: e.MAILJET_BASE_URL,
      ...options,
      apiKeyPublic: e.MAILJET_API_KEY_PUBLIC,
      apiKeyPrivate: e.MAILJET_API_KEY_PRIVATE,
    })
  }

  async send(messages: RenderedEmail[]): Promise<number> {
    if (messages.length === 0) return 0
    const payload = { Messages: messages.map(makeMailjetMessage) }

    let response: JsonResponse
    try {
      response = await this.client.post('/v3.1/send', payload)
    } catch (e) {
      if (!(e instanceof HttpTransportError)) throw e
      this.logger.warn(`[herald] mailjet email: ${e.message}`)
      return 0
    }
    if (!response.ok) {
      this.logger.warn(`[herald] mailjet email: HTTP ${response.status}`)
      return 0
    }
    const output = SendEmailOutput.safeParse(response.body)
    if (!output.success) {
      this.logger.warn('[herald] mailjet email: unexpected response body')
      return 0
    }
    return output.data.Messages.filter((m) => m.Status === 'success').length
  }
}
