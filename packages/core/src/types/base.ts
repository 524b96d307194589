import type { Awaitable, MessageDraft, MessageKind } from '../index'
import type { JsonObject, JsonValue } from '../json'
import { ConfigurationError } from '../errors'
import { resolveBaseUrl } from '../render/baseUrl'
import type { MessageEnvironment } from './environment'

export interface MessageType<K extends MessageKind = MessageKind> {
  readonly message: MessageDraft<K>
  getLocale(): Awaitable<string>
  /** Called once per message, during send(). The result is frozen and stored. */
  getContext(): Awaitable<JsonObject>
  getTo(): Awaitable<string>
  getFrom(): Awaitable<string>
  getBaseUrl(): Awaitable<string>
  makeAbsolute(path: string): Promise<string>
}

export abstract class BaseMessageType<K extends MessageKind> implements MessageType<K> {
  constructor(
    readonly message: MessageDraft<K>,
    readonly env: MessageEnvironment
  ) {}

  get data(): JsonValue {
    return this.message.data
  }

  get context(): JsonObject {
    const { context } = this.message
    if (!context) {
      throw new ConfigurationError(`Context of "${this.message.type}" is read before it has been computed`)
    }
    return context
  }

  abstract getLocale(): Awaitable<string>
  abstract getContext(): Awaitable<JsonObject>
  abstract getTo(): Awaitable<string>
  abstract getFrom(): Awaitable<string>

  getBaseUrl(): Awaitable<string> {
    return resolveBaseUrl(this.env.config, this.env.sites)
  }

  async makeAbsolute(path: string): Promise<string> {
    return new URL(path, await this.getBaseUrl()).toString()
  }

  protected t(msgid: string, params?: Record<string, unknown>): string {
    return this.env.translator.t(msgid, params)
  }
}
