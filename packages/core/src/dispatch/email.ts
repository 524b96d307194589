import type { EmailBackend, MessageDraft, RenderedEmail } from '../index'
import { isNotImplemented, NotFoundError } from '../errors'
import type { EmailType } from '../types/email'
import type { MessageEnvironment } from '../types/environment'
import { Dispatcher, omitIfNotImplemented, type Addressing, type DispatcherOptions, type RenderedView } from './dispatcher'

export type EmailDispatcherOptions = DispatcherOptions<'email'> & { backend: EmailBackend }

export class EmailDispatcher extends Dispatcher<'email', EmailType> {
  protected readonly kind = 'email'
  private readonly backend: EmailBackend

  constructor(options: EmailDispatcherOptions) {
    super(options)
    this.backend = options.backend
  }

  protected factoryFor(typeName: string): (message: MessageDraft<'email'>, env: MessageEnvironment) => Promise<EmailType> {
    const factory = this.options.registry.resolve('email', typeName)
    return async (message, env) => factory(message, env)
  }

  protected normalizeRecipient(raw: string): string {
    return raw.trim()
  }

  /** Renders every part of the email without sending it. */
  async render(type: EmailType, { sender, recipient }: Addressing): Promise<RenderedEmail> {
    const text = await omitIfNotImplemented(() => type.getTextContent())
    const html = await omitIfNotImplemented(() => type.getHtmlContent())
    if (text === undefined && html === undefined) {
      this.logger.warn(`[herald] email ${type.message.id} (${type.message.type}) has neither a text nor an HTML part`)
    }
    return {
      from: sender,
      to: [recipient],
      cc: [],
      bcc: [],
      subject: await type.getSubject(),
      text,
      html,
      attachments: await type.getAttachments(),
      headers: await type.getHeaders(),
    }
  }

  protected async deliver(type: EmailType, addressing: Addressing): Promise<number> {
    return this.backend.send([await this.render(type, addressing)])
  }

  protected async renderView(type: EmailType, format: string): Promise<RenderedView> {
    try {
      if (format === 'html') return { contentType: 'text/html', body: await type.getHtmlContent() }
      if (format === 'txt') return { contentType: 'text/plain', body: await type.getTextContent() }
    } catch (e) {
      if (isNotImplemented(e)) throw new NotFoundError(`Email ${type.message.id} has no ${format} part`, { cause: e })
      throw e
    }
    throw new NotFoundError(`Unknown email format "${format}"`)
  }
}
