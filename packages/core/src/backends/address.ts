import { InvalidAddressError } from '../errors'

export type ParsedAddress = { address: string; name?: string }

const ANGLE = /^(.*?)<([^<>]*)>$/

function unquote(name: string): string {
  const trimmed = name.trim()
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1')
  }
  return trimmed
}

/**
 * "Foo <foo@bar.com>", "\"Foo Bar\" <foo@bar.com>" or a bare "foo@bar.com".
 */
export function parseAddress(raw: string): ParsedAddress {
  const value = raw.trim()
  const angled = ANGLE.exec(value)
  const address = (angled ? angled[2] ?? '' : value).trim()
  if (!address || /[\s<>,;"]/.test(address)) throw new InvalidAddressError(raw)
  const name = angled ? unquote(angled[1] ?? '') : ''
  return name ? { address, name } : { address }
}
