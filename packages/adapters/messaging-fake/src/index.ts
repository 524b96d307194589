import type { EmailBackend, RenderedEmail, RenderedSms, SmsBackend } from '@herald/core'

/**
 * Keeps every message it is handed. `deliver` decides the reported count,
 * so tests can script partial or failed deliveries.
 */
class MemoryOutbox<M> {
  readonly outbox: M[] = []
  deliver: (batch: M[]) => number | Promise<number> = (batch) => batch.length

  async send(batch: M[]): Promise<number> {
    this.outbox.push(...batch)
    return this.deliver(batch)
  }

  clear() {
    this.outbox.length = 0
  }
}

export class FakeEmailBackend extends MemoryOutbox<RenderedEmail> implements EmailBackend {}

export class FakeSmsBackend extends MemoryOutbox<RenderedSms> implements SmsBackend {
  /** Counts recipients rather than messages, like the real SMS backends. */
  deliver = (batch: RenderedSms[]) => batch.reduce((n, sms) => n + sms.recipients.length, 0)
}
