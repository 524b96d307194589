import { z } from 'zod'
import twilio from 'twilio'
import { parseEnv, type Logger, type RenderedSms, type SmsBackend } from '@herald/core'

type TwilioClient = ReturnType<typeof twilio>
type MessageCreateOptions = Parameters<TwilioClient['messages']['create']>[0]

/** The part of the Twilio client the backend uses. */
export type TwilioMessagesClient = {
  messages: { create(params: MessageCreateOptions): Promise<{ sid: string }> }
}

export const TwilioEnv = z.object({
  TWILIO_ACCOUNT_SID: z.string().min(1),
  TWILIO_AUTH_TOKEN: z.string().min(1),
  TWILIO_MESSAGING_SERVICE_SID: z.string().min(1).optional(),
})

export type TwilioSmsBackendOptions = {
  messagingServiceSid?: string
  logger?: Logger
} & ({ accountSid: string; authToken: string } | { client: TwilioMessagesClient })

/**
 * One messages.create() per recipient, like the Mailjet SMS backend. Without
 * an originator the messaging service picks the sender.
 */
export class TwilioSmsBackend implements SmsBackend {
  private readonly client: TwilioMessagesClient
  private readonly messagingServiceSid?: string
  private readonly logger: Logger

  constructor(args: TwilioSmsBackendOptions) {
    this.client = 'client' in args ? args.client : twilio(args.accountSid, args.authToken)
    this.messagingServiceSid = args.messagingServiceSid
    this.logger = args.logger ?? console
  }

  static fromEnv(env: Record<string, string | undefined> = process.env, logger?: Logger): TwilioSmsBackend {
    const e = parseEnv(TwilioEnv, env)
    return new TwilioSmsBackend({
      accountSid: e.TWILIO_ACCOUNT_SID,
      authToken: e.TWILIO_AUTH_TOKEN,
      messagingServiceSid: e.TWILIO_MESSAGING_SERVICE_SID,
      logger,
    })
  }

  async send(messages: RenderedSms[]): Promise<number> {
    let sent = 0
    for (const message of messages) {
      for (const to of message.recipients) {
        if (await this.createOne(to, message)) sent++
      }
    }
    return sent
  }

  private async createOne(to: string, message: RenderedSms): Promise<boolean> {
    const params: MessageCreateOptions = {
      to,
      body: message.body,
    }
    if (message.originator) {
      params.from = message.originator
    } else if (this.messagingServiceSid) {
      params.messagingServiceSid = this.messagingServiceSid
    }
    try {
      await this.client.messages.create(params)
      return true
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e)
      this.logger.warn(`[herald] twilio sms to ${to}: ${reason}`)
      return false
    }
  }
}
