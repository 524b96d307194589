import { AsyncLocalStorage } from 'node:async_hooks'

const activeLocale = new AsyncLocalStorage<string>()

let fallbackLocale = 'en'

export function setDefaultLocale(locale: string) {
  fallbackLocale = locale
}

export function currentLocale(): string {
  return activeLocale.getStore() ?? fallbackLocale
}

/**
 * Runs `fn` with `locale` active for every await inside it. The override is
 * bound to this async call chain only, so concurrent sends never see each
 * other's locale, and it ends when `fn` settles or throws.
 */
export function withLocale<T>(locale: string, fn: () => Promise<T>): Promise<T> {
  return activeLocale.run(locale, fn)
}
