import {
  ConfigurationError,
  HttpTransportError,
  type JsonHttpClient,
  type Logger,
  type RenderedSms,
  type SmsBackend,
} from '@herald/core'
import { makeBearerClient, readMailjetEnv, type MailjetTransportOptions } from './client'

export type MailjetSmsRequest = { From: string; To: string; Text: string }

// No bulk endpoint: one request per recipient
export function makeSmsRequests(sms: RenderedSms): MailjetSmsRequest[] {
  return sms.recipients.map((to) => ({ From: sms.originator, To: to, Text: sms.body }))
}

export type MailjetSmsBackendOptions = MailjetTransportOptions & { apiToken: string }

export class MailjetSmsBackend implements SmsBackend {
  private readonly client: JsonHttpClient
  private readonly logger: Logger

  constructor(options: MailjetSmsBackendOptions) {
    this.client = makeBearerClient(options.apiToken, options)
    this.logger = options.logger ?? console
  }

  static fromEnv(env: Record<string, string | undefined> = process.env, options: MailjetTransportOptions = {}): MailjetSmsBackend {
    const e = readMailjetEnv(env)
    if (!e.MAILJET_API_TOKEN) throw new ConfigurationError('MAILJET_API_TOKEN is required for Mailjet SMS')
    return new MailjetSmsBackend({ baseUrl: e.MAILJET_BASE_URL, ...options, apiToken: e.MAILJET_API_TOKEN })
  }

  /** Counts successful calls, so a message with several recipients may be partly delivered. */
  async send(messages: RenderedSms[]): Promise<number> {
    let sent = 0
    for (const message of messages) {
      for (const request of makeSmsRequests(message)) {
        if (await this.post(request)) sent++
      }
    }
    return sent
  }

  private async post(request: MailjetSmsRequest): Promise<boolean> {
    try {
      const response = await this.client.post('/v4/sms-send', request)
      if (!response.ok) this.logger.warn(`[herald] mailjet sms to ${request.To}: HTTP ${response.status}`)
      return response.ok
    } catch (e) {
      if (!(e instanceof HttpTransportError)) throw e
      this.logger.warn(`[herald] mailjet sms to ${request.To}: ${e.message}`)
      return false
    }
  }
}
