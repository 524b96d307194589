import { readdirSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { currentLocale } from './locale'

export type Catalog = Record<string, string>

const CatalogSchema = z.record(z.string())

export function interpolate(template: string, params: Record<string, unknown> = {}): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => {
    if (!Object.hasOwn(params, key)) return whole
    const value = params[key]
    return value == null ? '' : String(value)
  })
}

export class Translator {
  private readonly catalogs: Map<string, Catalog>

  constructor(catalogs: Record<string, Catalog> = {}, private readonly defaultLocale = 'en') {
    this.catalogs = new Map(Object.entries(catalogs))
  }

  /** Loads every `<locale>.json` file of a directory. */
  static fromDirectory(dir: string, defaultLocale = 'en'): Translator {
    const catalogs: Record<string, Catalog> = {}
    for (const file of readdirSync(dir)) {
      if (!file.endsWith('.json')) continue
      const locale = file.slice(0, -'.json'.length)
      const parsed = CatalogSchema.safeParse(JSON.parse(readFileSync(path.join(dir, file), 'utf8')))
      if (!parsed.success) throw new ConfigurationError(`Catalog ${file} must map strings to strings`)
      catalogs[locale] = parsed.data
    }
    return new Translator(catalogs, defaultLocale)
  }

  lookup(msgid: string, locale: string = currentLocale()): string {
    const base = locale.split(/[-_]/)[0]
    for (const candidate of [locale, base, this.defaultLocale]) {
      const hit = this.catalogs.get(candidate)?.[msgid]
      if (hit !== undefined) return hit
    }
    return msgid
  }

  t(msgid: string, params?: Record<string, unknown>): string {
    return interpolate(this.lookup(msgid), params)
  }
}
