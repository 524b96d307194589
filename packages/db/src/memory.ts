import { NotFoundError, type MessageKind, type MessageRecord, type MessageStore, type SentUpdate } from '@herald/core'

/**
 * Process-local store. Owner deletion is explicit through deleteByOwner(),
 * standing in for the foreign-key cascade of the SQL tables.
 */
export class MemoryMessageStore<K extends MessageKind = MessageKind> implements MessageStore<K> {
  private readonly rows = new Map<string, MessageRecord<K>>()

  async insert(record: MessageRecord<K>): Promise<MessageRecord<K>> {
    this.rows.set(record.id, { ...record })
    return { ...record }
  }

  async get(id: string): Promise<MessageRecord<K> | null> {
    const row = this.rows.get(id)
    return row ? { ...row } : null
  }

  async markSent(id: string, update: SentUpdate): Promise<MessageRecord<K>> {
    const row = this.rows.get(id)
    if (!row) throw new NotFoundError(`No message with id ${id}`)
    const next = { ...row, ...update }
    this.rows.set(id, next)
    return { ...next }
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id)
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    let count = 0
    for (const [id, row] of this.rows) {
      if (row.ownerId === ownerId && this.rows.delete(id)) count++
    }
    return count
  }

  all(): MessageRecord<K>[] {
    return [...this.rows.values()].map((row) => ({ ...row }))
  }
}
