import type { JsonObject, JsonValue } from './json'

export type MessageKind = 'email' | 'sms'

export type Awaitable<T> = T | Promise<T>

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export interface MessageRecord<K extends MessageKind = MessageKind> {
  id: string
  kind: K
  type: string
  data: JsonValue
  context: JsonObject
  sender: string
  recipient: string
  ownerId: string | null
  createdAt: Date
  sentAt: Date | null
}

// Before the context is frozen during send()
export type MessageDraft<K extends MessageKind = MessageKind> = Omit<MessageRecord<K>, 'context'> & {
  context: JsonObject | null
}

export type EmailRecord = MessageRecord<'email'>
export type SmsRecord = MessageRecord<'sms'>

export type SentUpdate = { sentAt: Date; sender: string; recipient: string }

export interface MessageStore<K extends MessageKind = MessageKind> {
  insert(record: MessageRecord<K>): Promise<MessageRecord<K>>
  get(id: string): Promise<MessageRecord<K> | null>
  markSent(id: string, update: SentUpdate): Promise<MessageRecord<K>>
  delete(id: string): Promise<boolean>
  deleteByOwner(ownerId: string): Promise<number>
}

export type Attachment = { filename: string; contentType: string; content: Uint8Array | string }

export type RenderedEmail = {
  from: string
  to: string[]
  cc: string[]
  bcc: string[]
  subject: string
  text?: string
  html?: string
  attachments: Attachment[]
  headers: Record<string, string>
}

export type RenderedSms = {
  originator: string
  recipients: string[]
  body: string
}

/** Provider adapters report how many messages of the batch went out. */
export interface EmailBackend {
  send(messages: RenderedEmail[]): Promise<number>
}

export interface SmsBackend {
  send(messages: RenderedSms[]): Promise<number>
}

export interface TemplateRenderer {
  render(templateId: string, context: Record<string, unknown>): Awaitable<string>
}

export interface HtmlProcessor {
  process(html: string, baseUrl: string): Awaitable<string>
}

export interface SiteRegistry {
  getDomain(siteId?: string): Awaitable<string | null>
}

export type Owner = { id: string }

export * from './json'
export * from './errors'
export * from './config'
export * from './phone'
export * from './i18n/locale'
export * from './i18n/translator'
export * from './render/templates'
export * from './render/html'
export * from './render/baseUrl'
export * from './backends/address'
export * from './backends/attachments'
export * from './backends/headers'
export * from './backends/http'
export * from './types/environment'
export * from './types/base'
export * from './types/email'
export * from './types/sms'
export * from './types/define'
export * from './types/registry'
export * from './dispatch/dispatcher'
export * from './dispatch/email'
export * from './dispatch/sms'
export * from './dispatch/permalinks'
export * from './herald'
