import type { MessageDraft, RenderedSms, SmsBackend } from '../index'
import { NotFoundError } from '../errors'
import { toE164 } from '../phone'
import type { SmsType } from '../types/sms'
import type { MessageEnvironment } from '../types/environment'
import { Dispatcher, type Addressing, type DispatcherOptions, type RenderedView } from './dispatcher'

export type SmsDispatcherOptions = DispatcherOptions<'sms'> & { backend: SmsBackend }

export class SmsDispatcher extends Dispatcher<'sms', SmsType> {
  protected readonly kind = 'sms'
  private readonly backend: SmsBackend

  constructor(options: SmsDispatcherOptions) {
    super(options)
    this.backend = options.backend
  }

  protected factoryFor(typeName: string): (message: MessageDraft<'sms'>, env: MessageEnvironment) => Promise<SmsType> {
    const factory = this.options.registry.resolve('sms', typeName)
    return async (message, env) => factory(message, env)
  }

  protected normalizeRecipient(raw: string): string {
    return toE164(raw)
  }

  async render(type: SmsType, { sender, recipient }: Addressing): Promise<RenderedSms> {
    return { originator: sender, recipients: [recipient], body: await type.getContent() }
  }

  protected async deliver(type: SmsType, addressing: Addressing): Promise<number> {
    return this.backend.send([await this.render(type, addressing)])
  }

  protected async renderView(type: SmsType, format: string): Promise<RenderedView> {
    if (format !== 'txt') throw new NotFoundError(`Unknown SMS format "${format}"`)
    return { contentType: 'text/plain', body: await type.getContent() }
  }
}
