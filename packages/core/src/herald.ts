import type { EmailBackend, Logger, MessageStore, SiteRegistry, SmsBackend } from './index'
import { loadConfig, type HeraldConfig } from './config'
import { setDefaultLocale } from './i18n/locale'
import { Translator } from './i18n/translator'
import { EmailHtmlProcessor } from './render/html'
import { FileTemplateRenderer } from './render/templates'
import type { MessageEnvironment } from './types/environment'
import { MessageTypeRegistry, type TypeMappings } from './types/registry'
import { EmailDispatcher } from './dispatch/email'
import { SmsDispatcher } from './dispatch/sms'

export type HeraldOptions = {
  types: MessageTypeRegistry | TypeMappings
  templatesDir: string
  localesDir?: string
  config?: HeraldConfig
  sites?: SiteRegistry
  stores: { email: MessageStore<'email'>; sms: MessageStore<'sms'> }
  backends: { email: EmailBackend; sms: SmsBackend }
  logger?: Logger
  now?: () => Date
}

export type Herald = {
  config: HeraldConfig
  env: MessageEnvironment
  registry: MessageTypeRegistry
  email: EmailDispatcher
  sms: SmsDispatcher
}

export function createHerald(options: HeraldOptions): Herald {
  const config = options.config ?? loadConfig()
  setDefaultLocale(config.defaultLocale)

  const translator = options.localesDir
    ? Translator.fromDirectory(options.localesDir, config.defaultLocale)
    : new Translator({}, config.defaultLocale)
  const env: MessageEnvironment = {
    config,
    translator,
    templates: new FileTemplateRenderer({ root: options.templatesDir, translator }),
    html: new EmailHtmlProcessor({
      preserveInternalLinks: config.preserveInternalLinks,
      preserveInlineImages: config.preserveInlineImages,
    }),
    sites: options.sites,
  }
  const registry = options.types instanceof MessageTypeRegistry ? options.types : new MessageTypeRegistry(options.types)
  const shared = { registry, env, logger: options.logger, now: options.now }

  return {
    config,
    env,
    registry,
    email: new EmailDispatcher({ ...shared, store: options.stores.email, backend: options.backends.email }),
    sms: new SmsDispatcher({ ...shared, store: options.stores.sms, backend: options.backends.sms }),
  }
}
