import type { z } from 'zod'
import type { Attachment, Awaitable, MessageDraft, MessageKind } from '../index'
import type { JsonObject } from '../json'
import { ConfigurationError } from '../errors'
import type { TemplateContext } from '../render/templates'
import type { BaseMessageType } from './base'
import { BaseEmailType, type EmailType } from './email'
import { BaseSmsType, type SmsType } from './sms'
import type { MessageEnvironment } from './environment'

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export interface TypeScope<TData, TContext extends JsonObject> {
  readonly data: TData
  /** The frozen context, parsed with the definition's schema. */
  readonly context: TContext
  readonly message: MessageDraft
  readonly env: MessageEnvironment
  t(msgid: string, params?: Record<string, unknown>): string
  makeAbsolute(path: string): Promise<string>
}

export type ContextScope<TData> = Omit<TypeScope<TData, JsonObject>, 'context'>

interface CommonDefinition<TData, TContext extends JsonObject> {
  data: Schema<TData>
  context: Schema<TContext>
  buildContext(scope: ContextScope<TData>): Awaitable<TContext>
  locale(scope: TypeScope<TData, TContext>): Awaitable<string>
  to(scope: TypeScope<TData, TContext>): Awaitable<string>
  from?(scope: TypeScope<TData, TContext>): Awaitable<string>
}

export interface EmailTypeDefinition<TData, TContext extends JsonObject> extends CommonDefinition<TData, TContext> {
  subject(scope: TypeScope<TData, TContext>): Awaitable<string>
  templates?: { text?: string; html?: string }
  templateContext?(scope: TypeScope<TData, TContext>): Awaitable<TemplateContext>
  attachments?(scope: TypeScope<TData, TContext>): Awaitable<Attachment[]>
  headers?(scope: TypeScope<TData, TContext>): Awaitable<Record<string, string>>
}

export interface SmsTypeDefinition<TData, TContext extends JsonObject> extends CommonDefinition<TData, TContext> {
  content(scope: TypeScope<TData, TContext>): Awaitable<string>
}

class DefinitionScope<TData, TContext extends JsonObject> implements TypeScope<TData, TContext> {
  private parsed?: TContext

  constructor(
    private readonly owner: BaseMessageType<MessageKind>,
    readonly data: TData,
    private readonly schema: Schema<TContext>
  ) {}

  get message(): MessageDraft {
    return this.owner.message
  }

  get env(): MessageEnvironment {
    return this.owner.env
  }

  get context(): TContext {
    if (this.parsed === undefined) {
      const result = this.schema.safeParse(this.owner.context)
      if (!result.success) {
        throw new ConfigurationError(`Stored context of "${this.message.type}" does not match its schema`)
      }
      this.parsed = result.data
    }
    return this.parsed
  }

  // Bound, so definitions may destructure them from the scope
  readonly t = (msgid: string, params?: Record<string, unknown>): string => this.owner.env.translator.t(msgid, params)

  readonly makeAbsolute = (path: string): Promise<string> => this.owner.makeAbsolute(path)
}

function parseData<TData>(schema: Schema<TData>, message: MessageDraft): TData {
  const result = schema.safeParse(message.data)
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid data for type "${message.type}": ${details}`)
  }
  return result.data
}

class DefinedEmailType<TData, TContext extends JsonObject> extends BaseEmailType {
  private readonly scope: DefinitionScope<TData, TContext>

  constructor(
    message: MessageDraft<'email'>,
    env: MessageEnvironment,
    private readonly def: EmailTypeDefinition<TData, TContext>
  ) {
    super(message, env)
    this.scope = new DefinitionScope(this, parseData(def.data, message), def.context)
  }

  getLocale() {
    return this.def.locale(this.scope)
  }

  getContext() {
    return this.def.buildContext(this.scope)
  }

  getTo() {
    return this.def.to(this.scope)
  }

  getFrom() {
    return this.def.from ? this.def.from(this.scope) : super.getFrom()
  }

  getSubject() {
    return this.def.subject(this.scope)
  }

  getTemplateTextPath(): string {
    return this.def.templates?.text ?? super.getTemplateTextPath()
  }

  getTemplateHtmlPath(): string {
    return this.def.templates?.html ?? super.getTemplateHtmlPath()
  }

  getTemplateContext() {
    return this.def.templateContext ? this.def.templateContext(this.scope) : super.getTemplateContext()
  }

  getAttachments() {
    return this.def.attachments ? this.def.attachments(this.scope) : super.getAttachments()
  }

  getHeaders() {
    return this.def.headers ? this.def.headers(this.scope) : super.getHeaders()
  }
}

class DefinedSmsType<TData, TContext extends JsonObject> extends BaseSmsType {
  private readonly scope: DefinitionScope<TData, TContext>

  constructor(
    message: MessageDraft<'sms'>,
    env: MessageEnvironment,
    private readonly def: SmsTypeDefinition<TData, TContext>
  ) {
    super(message, env)
    this.scope = new DefinitionScope(this, parseData(def.data, message), def.context)
  }

  getLocale() {
    return this.def.locale(this.scope)
  }

  getContext() {
    return this.def.buildContext(this.scope)
  }

  getTo() {
    return this.def.to(this.scope)
  }

  getFrom() {
    return this.def.from ? this.def.from(this.scope) : super.getFrom()
  }

  getContent() {
    return this.def.content(this.scope)
  }
}

export type DefinedEmailTypeFactory<TData, TContext extends JsonObject> = {
  (message: MessageDraft<'email'>, env: MessageEnvironment): EmailType
  readonly definition: EmailTypeDefinition<TData, TContext>
  /** A variant sharing everything but the overridden accessors. */
  extend(overrides: Partial<EmailTypeDefinition<TData, TContext>>): DefinedEmailTypeFactory<TData, TContext>
}

export type DefinedSmsTypeFactory<TData, TContext extends JsonObject> = {
  (message: MessageDraft<'sms'>, env: MessageEnvironment): SmsType
  readonly definition: SmsTypeDefinition<TData, TContext>
  extend(overrides: Partial<SmsTypeDefinition<TData, TContext>>): DefinedSmsTypeFactory<TData, TContext>
}

export function defineEmailType<TData, TContext extends JsonObject>(
  definition: EmailTypeDefinition<TData, TContext>
): DefinedEmailTypeFactory<TData, TContext> {
  const factory = (message: MessageDraft<'email'>, env: MessageEnvironment): EmailType =>
    new DefinedEmailType(message, env, definition)
  return Object.assign(factory, {
    definition,
    extend: (overrides: Partial<EmailTypeDefinition<TData, TContext>>) => defineEmailType({ ...definition, ...overrides }),
  })
}

export function defineSmsType<TData, TContext extends JsonObject>(
  definition: SmsTypeDefinition<TData, TContext>
): DefinedSmsTypeFactory<TData, TContext> {
  const factory = (message: MessageDraft<'sms'>, env: MessageEnvironment): SmsType => new DefinedSmsType(message, env, definition)
  return Object.assign(factory, {
    definition,
    extend: (overrides: Partial<SmsTypeDefinition<TData, TContext>>) => defineSmsType({ ...definition, ...overrides }),
  })
}
