import type { HtmlProcessor, SiteRegistry, TemplateRenderer } from '../index'
import type { HeraldConfig } from '../config'
import type { Translator } from '../i18n/translator'

/** What a message type may use besides its own record. */
export interface MessageEnvironment {
  config: HeraldConfig
  templates: TemplateRenderer
  html: HtmlProcessor
  translator: Translator
  sites?: SiteRegistry
}
