import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { NotFoundError, parseEnv, type MessageKind, type MessageRecord, type MessageStore, type SentUpdate } from '@herald/core'
import { fromRow, TABLES, toRow } from './rows'

export const SupabaseEnv = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
})

// Ids that cannot be in a uuid column; PostgREST would answer 22P02 for them
const isId = (id: string) => z.string().uuid().safeParse(id).success

export function getService(env: Record<string, string | undefined> = process.env, fetch?: typeof globalThis.fetch): SupabaseClient {
  const e = parseEnv(SupabaseEnv, env)
  return createClient(e.SUPABASE_URL, e.SUPABASE_SERVICE_KEY, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: fetch ? { fetch } : undefined,
  })
}

/**
 * Messages in the herald_emails / herald_sms tables. Deleting an auth user
 * cascades to their messages through owner_id.
 */
export class SupabaseMessageStore<K extends MessageKind> implements MessageStore<K> {
  private readonly table: string

  constructor(
    private readonly sb: SupabaseClient,
    private readonly kind: K
  ) {
    this.table = TABLES[kind]
  }

  async insert(record: MessageRecord<K>): Promise<MessageRecord<K>> {
    const { data, error } = await this.sb.from(this.table).insert(toRow(record)).select()
    if (error) throw error
    return this.first(data, record.id)
  }

  async get(id: string): Promise<MessageRecord<K> | null> {
    if (!isId(id)) return null
    const { data, error } = await this.sb.from(this.table).select('*').eq('id', id).limit(1)
    if (error) throw error
    const [row] = z.array(z.unknown()).parse(data)
    return row === undefined ? null : fromRow(this.kind, row)
  }

  async markSent(id: string, update: SentUpdate): Promise<MessageRecord<K>> {
    if (!isId(id)) throw new NotFoundError(`No ${this.kind} with id ${id}`)
    const { data, error } = await this.sb
      .from(this.table)
      .update({ sent_at: update.sentAt.toISOString(), sender: update.sender, recipient: update.recipient })
      .eq('id', id)
      .select()
    if (error) throw error
    return this.first(data, id)
  }

  async delete(id: string): Promise<boolean> {
    if (!isId(id)) return false
    const { data, error } = await this.sb.from(this.table).delete().eq('id', id).select('id')
    if (error) throw error
    return z.array(z.unknown()).parse(data).length > 0
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    if (!isId(ownerId)) return 0
    const { data, error } = await this.sb.from(this.table).delete().eq('owner_id', ownerId).select('id')
    if (error) throw error
    return z.array(z.unknown()).parse(data).length
  }

  private first(data: unknown, id: string): MessageRecord<K> {
    const [row] = z.array(z.unknown()).parse(data)
    if (row === undefined) throw new NotFoundError(`No ${this.kind} with id ${id}`)
    return fromRow(this.kind, row)
  }
}

export function createSupabaseStores(sb: SupabaseClient): { email: SupabaseMessageStore<'email'>; sms: SupabaseMessageStore<'sms'> } {
  return { email: new SupabaseMessageStore(sb, 'email'), sms: new SupabaseMessageStore(sb, 'sms') }
}
