import type { MessageKind } from '../index'
import { ConfigurationError } from '../errors'
import type { EmailTypeFactory } from './email'
import type { SmsTypeFactory } from './sms'

export type TypeFactories = { email: EmailTypeFactory; sms: SmsTypeFactory }

type TypeTables = { [K in MessageKind]: Map<string, TypeFactories[K]> }

export type TypeMappings = {
  email?: Record<string, EmailTypeFactory>
  sms?: Record<string, SmsTypeFactory>
}

/**
 * Type names to factories, one table per kind. Filled at start-up and only
 * read afterwards.
 */
export class MessageTypeRegistry {
  private readonly tables: TypeTables = { email: new Map(), sms: new Map() }

  constructor(mappings: TypeMappings = {}) {
    for (const [name, factory] of Object.entries(mappings.email ?? {})) this.register('email', name, factory)
    for (const [name, factory] of Object.entries(mappings.sms ?? {})) this.register('sms', name, factory)
  }

  register<K extends MessageKind>(kind: K, name: string, factory: TypeFactories[K]): this {
    const table: Map<string, TypeFactories[K]> = this.tables[kind]
    if (table.has(name)) throw new ConfigurationError(`${kind} type "${name}" is already registered`)
    table.set(name, factory)
    return this
  }

  resolve<K extends MessageKind>(kind: K, name: string): TypeFactories[K] {
    const table: Map<string, TypeFactories[K]> = this.tables[kind]
    const factory = table.get(name)
    if (!factory) {
      const known = [...table.keys()].join(', ') || 'none'
      throw new ConfigurationError(`Unknown ${kind} type "${name}" (registered: ${known})`)
    }
    return factory
  }

  has(kind: MessageKind, name: string): boolean {
    return this.tables[kind].has(name)
  }

  names(kind: MessageKind): string[] {
    return [...this.tables[kind].keys()]
  }
}
