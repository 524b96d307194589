import { fileURLToPath } from 'node:url'
import {
  createHerald,
  loadConfig,
  type Herald,
  type HeraldConfig,
  type Logger,
  type MessageStore,
  type SiteRegistry,
} from '@herald/core'
import { MemoryMessageStore } from '@herald/db'
import { backendsFromEnv, type Backends } from './backends'
import { emailTypes } from './emails'
import { smsTypes } from './sms'
import { MemoryUserDirectory, StaticSiteRegistry, type UserDirectory } from './users'

export const TEMPLATES_DIR = fileURLToPath(new URL('../templates', import.meta.url))
export const LOCALES_DIR = fileURLToPath(new URL('../locales', import.meta.url))

export type DemoOptions = {
  config?: HeraldConfig
  users?: UserDirectory
  sites?: SiteRegistry
  stores?: { email: MessageStore<'email'>; sms: MessageStore<'sms'> }
  backends?: Backends
  logger?: Logger
  now?: () => Date
}

export type Demo = Herald & {
  users: UserDirectory
  stores: { email: MessageStore<'email'>; sms: MessageStore<'sms'> }
  backends: Backends
  /** Removes a user together with every message they own. */
  deleteUser(id: string): Promise<number>
}

export function createDemo(options: DemoOptions = {}): Demo {
  const users = options.users ?? new MemoryUserDirectory()
  const stores = options.stores ?? { email: new MemoryMessageStore<'email'>(), sms: new MemoryMessageStore<'sms'>() }
  const backends = options.backends ?? backendsFromEnv()

  const herald = createHerald({
    types: { email: emailTypes(users), sms: smsTypes(users) },
    templatesDir: TEMPLATES_DIR,
    localesDir: LOCALES_DIR,
    config: options.config ?? loadConfig(),
    sites: options.sites ?? new StaticSiteRegistry({ default: 'example.com' }),
    stores,
    backends,
    logger: options.logger,
    now: options.now,
  })

  return {
    ...herald,
    users,
    stores,
    backends,
    async deleteUser(id) {
      await users.remove(id)
      const [emails, sms] = await Promise.all([stores.email.deleteByOwner(id), stores.sms.deleteByOwner(id)])
      return emails + sms
    },
  }
}
