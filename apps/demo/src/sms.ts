import { z } from 'zod'
import {
  BaseSmsType,
  defineSmsType,
  type Awaitable,
  type JsonObject,
  type MessageDraft,
  type MessageEnvironment,
  type SmsTypeFactory,
} from '@herald/core'
import { fullName, userIdOf, type User, type UserDirectory } from './users'

const SENDER = 'Herald'

export const helloSms = defineSmsType({
  data: z.record(z.string()),
  context: z.record(z.string()),
  buildContext: ({ data }) => ({ word: 'World', ...data }),
  locale: () => 'fr',
  to: () => '+34659424242',
  from: () => SENDER,
  content: ({ context, t }) => t('Hello {word}!', context),
})

type UserContent = (sms: UserSms) => Awaitable<string>

/**
 * An SMS to a user of the directory. The wording is passed in, so variants
 * differ by content only.
 */
export class UserSms extends BaseSmsType {
  constructor(
    message: MessageDraft<'sms'>,
    env: MessageEnvironment,
    readonly user: User,
    private readonly content: UserContent
  ) {
    super(message, env)
  }

  getFrom() {
    return SENDER
  }

  getTo() {
    return this.user.phoneNumber
  }

  getContext(): JsonObject {
    return { name: fullName(this.user), locale: this.user.locale }
  }

  getLocale() {
    const { locale } = this.context
    return typeof locale === 'string' ? locale : this.env.config.defaultLocale
  }

  getContent() {
    return this.content(this)
  }

  translate(msgid: string, params?: Record<string, unknown>): string {
    return this.t(msgid, params)
  }
}

function userSms(users: UserDirectory, content: UserContent): SmsTypeFactory {
  return async (message, env) => {
    return new UserSms(message, env, await users.get(userIdOf(message)), content)
  }
}

export const helloUserSms = (users: UserDirectory) =>
  userSms(users, (sms) => sms.translate('Hello {name}', { name: sms.context.name }))

export const comeHomeUserSms = (users: UserDirectory) =>
  userSms(users, async (sms) =>
    sms.translate('Hello {name}, come home to: {url}', { name: sms.context.name, url: await sms.makeAbsolute('/') })
  )

export function smsTypes(users: UserDirectory): Record<string, SmsTypeFactory> {
  return {
    hello: helloSms,
    'hello-user': helloUserSms(users),
    'come-home-user': comeHomeUserSms(users),
  }
}
