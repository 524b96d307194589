import { z } from 'zod'
import { JsonObjectSchema, JsonValueSchema, type MessageKind, type MessageRecord } from '@herald/core'

export const TABLES: Record<MessageKind, string> = {
  email: 'herald_emails',
  sms: 'herald_sms',
}

export const MessageRow = z.object({
  id: z.string().uuid(),
  type: z.string(),
  data: JsonValueSchema,
  context: JsonObjectSchema,
  sender: z.string(),
  recipient: z.string(),
  owner_id: z.string().uuid().nullable(),
  created_at: z.string(),
  sent_at: z.string().nullable(),
})

export type MessageRow = z.infer<typeof MessageRow>

export function toRow(record: MessageRecord): MessageRow {
  return {
    id: record.id,
    type: record.type,
    data: record.data,
    context: record.context,
    sender: record.sender,
    recipient: record.recipient,
    owner_id: record.ownerId,
    created_at: record.createdAt.toISOString(),
    sent_at: record.sentAt ? record.sentAt.toISOString() : null,
  }
}

export function fromRow<K extends MessageKind>(kind: K, raw: unknown): MessageRecord<K> {
  const row = MessageRow.parse(raw)
  return {
    id: row.id,
    kind,
    type: row.type,
    data: row.data,
    context: row.context,
    sender: row.sender,
    recipient: row.recipient,
    ownerId: row.owner_id,
    createdAt: new Date(row.created_at),
    sentAt: row.sent_at === null ? null : new Date(row.sent_at),
  }
}
