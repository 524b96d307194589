import { randomUUID } from 'node:crypto'
import type { Awaitable, Logger, MessageDraft, MessageKind, MessageRecord, MessageStore, Owner } from '../index'
import { isNotImplemented, NotFoundError } from '../errors'
import { withLocale } from '../i18n/locale'
import { freezeContext, freezeData } from '../json'
import type { MessageType } from '../types/base'
import type { MessageEnvironment } from '../types/environment'
import type { MessageTypeRegistry } from '../types/registry'

export type DispatcherOptions<K extends MessageKind> = {
  registry: MessageTypeRegistry
  store: MessageStore<K>
  env: MessageEnvironment
  logger?: Logger
  now?: () => Date
}

export type SendOutcome<K extends MessageKind> = { record: MessageRecord<K>; delivered: number }

export type Addressing = { sender: string; recipient: string }

export type RenderedView = { contentType: 'text/html' | 'text/plain'; body: string }

export async function omitIfNotImplemented<T>(fn: () => Awaitable<T>): Promise<T | undefined> {
  try {
    return await fn()
  } catch (e) {
    if (isNotImplemented(e)) return undefined
    throw e
  }
}

/**
 * Send lifecycle shared by emails and SMSs: resolve the type, freeze the
 * context, persist, then render and deliver under the type's locale.
 */
export abstract class Dispatcher<K extends MessageKind, T extends MessageType<K>> {
  protected abstract readonly kind: K
  protected readonly logger: Logger
  private readonly now: () => Date

  constructor(protected readonly options: DispatcherOptions<K>) {
    this.logger = options.logger ?? console
    this.now = options.now ?? (() => new Date())
  }

  protected abstract factoryFor(typeName: string): (message: MessageDraft<K>, env: MessageEnvironment) => Awaitable<T>
  protected abstract normalizeRecipient(raw: string): string
  protected abstract deliver(type: T, addressing: Addressing): Promise<number>
  protected abstract renderView(type: T, format: string): Promise<RenderedView>

  get store(): MessageStore<K> {
    return this.options.store
  }

  async instantiate(message: MessageDraft<K>): Promise<T> {
    return this.factoryFor(message.type)(message, this.options.env)
  }

  /**
   * Builds, stores and immediately sends a message. The record is persisted
   * before delivery, so a failed delivery can be retried with sendNow().
   */
  async send(typeName: string, data: unknown, owner?: Owner | null): Promise<MessageRecord<K>> {
    const factory = this.factoryFor(typeName)
    const draft: MessageDraft<K> = {
      id: randomUUID(),
      kind: this.kind,
      type: typeName,
      data: freezeData(data, typeName),
      context: null,
      sender: '',
      recipient: '',
      ownerId: owner?.id ?? null,
      createdAt: this.now(),
      sentAt: null,
    }
    const type = await factory(draft, this.options.env)
    draft.sender = await type.getFrom()
    draft.recipient = this.normalizeRecipient(await type.getTo())
    const context = freezeContext(await type.getContext(), typeName)

    const record = await this.options.store.insert({ ...draft, context })
    const { record: sent } = await this.sendNow(record)
    return sent
  }

  /**
   * Renders from the stored context and delivers. Sender and recipient are
   * looked up again, so an address changed since the first send is followed.
   */
  async sendNow(record: MessageRecord<K>): Promise<SendOutcome<K>> {
    const type = await this.instantiate(record)
    const locale = await type.getLocale()

    return withLocale(locale, async () => {
      const recipient = this.normalizeRecipient(await type.getTo())
      const sender = await type.getFrom()
      const delivered = await this.deliver(type, { sender, recipient })
      if (delivered < 1) {
        this.logger.warn(`[herald] ${this.kind} ${record.id} (${record.type}) to ${recipient} was not delivered`)
      }
      const updated = await this.options.store.markSent(record.id, { sentAt: this.now(), sender, recipient })
      return { record: updated, delivered }
    })
  }

  async resend(id: string): Promise<SendOutcome<K>> {
    return this.sendNow(await this.load(id))
  }

  /** Re-renders a stored message in its own locale for display. */
  async view(id: string, format: string): Promise<RenderedView> {
    const type = await this.instantiate(await this.load(id))
    const locale = await type.getLocale()
    return withLocale(locale, () => this.renderView(type, format))
  }

  private async load(id: string): Promise<MessageRecord<K>> {
    const record = await this.options.store.get(id)
    if (!record) throw new NotFoundError(`No ${this.kind} with id ${id}`)
    return record
  }
}
