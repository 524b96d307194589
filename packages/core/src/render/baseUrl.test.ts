import { describe, it, expect } from 'vitest'
import { baseUrlFromDomain, isLoopback, resolveBaseUrl } from './baseUrl'
import { TemplateError } from '../errors'

const site = (domain: string | null) => ({ getDomain: () => domain })

describe('resolveBaseUrl', () => {
  it('prefers the configured base URL', async () => {
    expect(await resolveBaseUrl({ baseUrl: 'https://mail.example.com' }, site('localhost:8000'))).toBe('https://mail.example.com')
  })

  it('uses http for loopback domains', async () => {
    expect(await resolveBaseUrl({}, site('localhost:8000'))).toBe('http://localhost:8000')
    expect(await resolveBaseUrl({}, site('127.0.0.1:8000'))).toBe('http://127.0.0.1:8000')
    expect(await resolveBaseUrl({}, site('[::1]:8000'))).toBe('http://[::1]:8000')
  })

  it('uses https otherwise', async () => {
    expect(await resolveBaseUrl({}, site('example.org'))).toBe('https://example.org')
  })

  it('passes the site id to the registry', async () => {
    const seen: Array<string | undefined> = []
    const sites = { getDomain: (id?: string) => (seen.push(id), 'example.net') }
    await resolveBaseUrl({ siteId: 'fr' }, sites)
    expect(seen).toEqual(['fr'])
  })

  it('fails without any source', async () => {
    await expect(resolveBaseUrl({})).rejects.toThrow(TemplateError)
    await expect(resolveBaseUrl({}, site(null))).rejects.toThrow(TemplateError)
  })
})

describe('isLoopback', () => {
  it('recognises loopback hosts', () => {
    expect(isLoopback('localhost')).toBe(true)
    expect(isLoopback('127.8.0.1')).toBe(true)
    expect(isLoopback('::1')).toBe(true)
    expect(isLoopback('10.0.0.1')).toBe(false)
    expect(isLoopback('example.org')).toBe(false)
  })

  it('keeps the port in the base URL', () => {
    expect(baseUrlFromDomain('example.org:8443')).toBe('https://example.org:8443')
  })
})
