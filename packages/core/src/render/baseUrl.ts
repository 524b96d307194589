import { isIP } from 'node:net'
import type { SiteRegistry } from '../index'
import type { HeraldConfig } from '../config'
import { TemplateError } from '../errors'

function splitHost(domain: string): string {
  if (domain.startsWith('[')) {
    const end = domain.indexOf(']')
    return end === -1 ? domain : domain.slice(1, end)
  }
  const colons = domain.split(':').length - 1
  // more than one colon: bare IPv6 literal, no port to strip
  if (colons > 1) return domain
  return domain.split(':')[0] ?? domain
}

export function isLoopback(host: string): boolean {
  if (host === 'localhost') return true
  const version = isIP(host)
  if (version === 4) return host.split('.')[0] === '127'
  if (version === 6) {
    const normalized = new URL(`http://[${host}]`).hostname
    return normalized === '[::1]' || normalized.startsWith('[::ffff:7f')
  }
  return false
}

export function baseUrlFromDomain(domain: string): string {
  const scheme = isLoopback(splitHost(domain)) ? 'http' : 'https'
  return `${scheme}://${domain}`
}

/**
 * Explicit base URL first, then the site registry, otherwise there is no way
 * to build absolute links.
 */
export async function resolveBaseUrl(config: Pick<HeraldConfig, 'baseUrl' | 'siteId'>, sites?: SiteRegistry): Promise<string> {
  if (config.baseUrl) return config.baseUrl
  if (sites) {
    const domain = await sites.getDomain(config.siteId)
    if (domain) return baseUrlFromDomain(domain)
  }
  throw new TemplateError('Cannot determine absolute URL: set HERALD_BASE_URL or provide a site registry')
}
