import { z } from 'zod'
import {
  BaseEmailType,
  defineEmailType,
  type EmailTypeFactory,
  type JsonObject,
  type MessageDraft,
  type MessageEnvironment,
} from '@herald/core'
import { fullName, userIdOf, type User, type UserDirectory } from './users'

const NoData = z.object({}).passthrough()

/** Purely static content, to check the plumbing. */
export const staticEmail = defineEmailType({
  data: NoData,
  context: z.object({ prefix: z.string() }),
  buildContext: () => ({ prefix: 'Static' }),
  locale: () => 'fr',
  to: () => 'foo@bar.com',
  subject: () => 'Static Subject',
  templates: { text: 'static.txt', html: 'static.html' },
})

export const staticNoText = staticEmail.extend({ templates: { html: 'static.html' } })

export const staticNoHtml = staticEmail.extend({ templates: { text: 'static.txt' } })

export const styledHtml = staticEmail.extend({ templates: { text: 'static.txt', html: 'styled-html.html' } })

export const absoluteUrl = staticEmail.extend({
  templates: { text: 'absolute-url.txt' },
  templateContext: async ({ context, makeAbsolute }) => ({ ...context, home: await makeAbsolute('/') }),
})

export const HelloData = z.object({
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  locale: z.string(),
})

export const hello = defineEmailType({
  data: HelloData,
  context: z.object({ name: z.string() }),
  buildContext: ({ data }) => ({ name: fullName({ firstName: data.first_name, lastName: data.last_name }) }),
  locale: ({ data }) => data.locale,
  to: ({ data }) => data.email,
  subject: ({ context, t }) => t('Hello {name}', { name: context.name }),
  templates: { text: 'hello.txt', html: 'hello.html' },
})

/**
 * Like `hello`, but the recipient comes from the user directory. The user is
 * looked up once, before the type is built, and only name and locale are
 * frozen into the context.
 */
export class HelloUserEmail extends BaseEmailType {
  constructor(
    message: MessageDraft<'email'>,
    env: MessageEnvironment,
    readonly user: User
  ) {
    super(message, env)
  }

  getTo() {
    return this.user.email
  }

  getContext(): JsonObject {
    return { name: fullName(this.user), locale: this.user.locale }
  }

  getLocale() {
    const { locale } = this.context
    return typeof locale === 'string' ? locale : this.env.config.defaultLocale
  }

  getSubject() {
    return this.t('Hello {name}', { name: this.context.name })
  }

  getTemplateTextPath() {
    return 'hello.txt'
  }

  getTemplateHtmlPath() {
    return 'hello.html'
  }
}

export function helloUser(users: UserDirectory): EmailTypeFactory {
  return async (message, env) => {
    return new HelloUserEmail(message, env, await users.get(userIdOf(message)))
  }
}

export function emailTypes(users: UserDirectory): Record<string, EmailTypeFactory> {
  return {
    static: staticEmail,
    'static-no-text': staticNoText,
    'static-no-html': staticNoHtml,
    'styled-html': styledHtml,
    'absolute-url': absoluteUrl,
    hello,
    'hello-user': helloUser(users),
  }
}
