import { describe, it, expect, vi } from 'vitest'
import type { FetchLike } from '@herald/core'
import { makeSmsRequests, MailjetSmsBackend } from './sms'

const quiet = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }

describe('MailjetSmsBackend', () => {
  it('fans a message out to one request per recipient', () => {
    expect(makeSmsRequests({ originator: '+33612000000', recipients: ['+33612345678', '+33698765432'], body: 'Hi' })).toEqual([
      { From: '+33612000000', To: '+33612345678', Text: 'Hi' },
      { From: '+33612000000', To: '+33698765432', Text: 'Hi' },
    ])
  })

  it('counts each successful call', async () => {
    const seen: Array<{ url: string; auth: string | undefined; body: unknown }> = []
    const fetch: FetchLike = async (url, init) => {
      const body: unknown = JSON.parse(init.body)
      seen.push({ url, auth: init.headers.Authorization, body })
      const failing = init.body.includes('+33698765432')
      return { ok: !failing, status: failing ? 400 : 200, json: async () => ({}) }
    }
    const backend = new MailjetSmsBackend({ apiToken: 'test-secret', fetch, logger: quiet })

    const delivered = await backend.send([{ originator: '+33612000000', recipients: ['+33612345678', '+33698765432'], body: 'Hi' }])

    expect(delivered).toBe(1)
    expect(seen.map((s) => s.url)).toEqual(['https://api.mailjet.com/v4/sms-send', 'https://api.mailjet.com/v4/sms-send'])
    expect(seen[0]?.auth).toBe('Bearer test-secret')
    expect(quiet.warn).toHaveBeenCalledWith('[herald] mailjet sms to +33698765432: HTTP 400')
  })

  it('treats transport errors as undelivered', async () => {
    const fetch: FetchLike = async () => Promise.reject(new Error('ETIMEDOUT'))
    const backend = new MailjetSmsBackend({ apiToken: 'test-secret', fetch, logger: quiet })
    expect(await backend.send([{ originator: '', recipients: ['+33612345678'], body: 'Hi' }])).toBe(0)
  })

  it('requires a token', () => {
    expect(() => MailjetSmsBackend.fromEnv({})).toThrow('MAILJET_API_TOKEN is required for Mailjet SMS')
  })
})
