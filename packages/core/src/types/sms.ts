import type { Awaitable, MessageDraft } from '../index'
import { parsePhone } from '../phone'
import { BaseMessageType, type MessageType } from './base'
import type { MessageEnvironment } from './environment'

export interface SmsType extends MessageType<'sms'> {
  getContent(): Awaitable<string>
}

export type SmsTypeFactory = (message: MessageDraft<'sms'>, env: MessageEnvironment) => Awaitable<SmsType>

/**
 * First configured sender number sharing the recipient's country calling
 * code, or an empty originator when none does.
 */
export function guessSmsSender(senders: readonly string[], to: string): string {
  const { countryCallingCode } = parsePhone(to)
  for (const candidate of senders) {
    const sender = parsePhone(candidate)
    if (sender.countryCallingCode === countryCallingCode) return sender.number
  }
  return ''
}

export abstract class BaseSmsType extends BaseMessageType<'sms'> implements SmsType {
  abstract getContent(): Awaitable<string>

  getFrom(): Awaitable<string> {
    return Promise.resolve(this.getTo()).then((to) => guessSmsSender(this.env.config.smsSenders, to))
  }
}
