import type { Attachment, Awaitable, MessageDraft } from '../index'
import { NotImplementedError } from '../errors'
import type { TemplateContext } from '../render/templates'
import { emailPermalink } from '../dispatch/permalinks'
import { BaseMessageType, type MessageType } from './base'
import type { MessageEnvironment } from './environment'

export interface EmailType extends MessageType<'email'> {
  getSubject(): Awaitable<string>
  /** Throws NotImplementedError when the email has no text part. */
  getTextContent(): Awaitable<string>
  /** Throws NotImplementedError when the email has no HTML part. */
  getHtmlContent(): Awaitable<string>
  getTemplateContext(): Awaitable<TemplateContext>
  getTemplateTextPath(): string
  getTemplateHtmlPath(): string
  getAttachments(): Awaitable<Attachment[]>
  getHeaders(): Awaitable<Record<string, string>>
}

export type EmailTypeFactory = (message: MessageDraft<'email'>, env: MessageEnvironment) => Awaitable<EmailType>

export abstract class BaseEmailType extends BaseMessageType<'email'> implements EmailType {
  abstract getSubject(): Awaitable<string>

  getFrom(): Awaitable<string> {
    return this.env.config.defaultFromEmail
  }

  getTemplateTextPath(): string {
    throw new NotImplementedError(`Email type "${this.message.type}" has no text template`)
  }

  getTemplateHtmlPath(): string {
    throw new NotImplementedError(`Email type "${this.message.type}" has no HTML template`)
  }

  getTemplateContext(): Awaitable<TemplateContext> {
    const links = { html: emailPermalink(this.message.id, 'html'), txt: emailPermalink(this.message.id, 'txt') }
    return { self: this.message, links, ...this.context }
  }

  async getTextContent(): Promise<string> {
    const templateId = this.getTemplateTextPath()
    return this.env.templates.render(templateId, await this.getTemplateContext())
  }

  // Rendered, then CSS inlined and links made absolute
  async getHtmlContent(): Promise<string> {
    const templateId = this.getTemplateHtmlPath()
    const html = await this.env.templates.render(templateId, await this.getTemplateContext())
    return this.env.html.process(html, await this.getBaseUrl())
  }

  getAttachments(): Awaitable<Attachment[]> {
    return []
  }

  getHeaders(): Awaitable<Record<string, string>> {
    return {}
  }
}
