import { describe, it, expect } from 'vitest'
import { NotFoundError, type MessageRecord } from '@herald/core'
import { createSupabaseStores, getService } from '../src/supabase'
import { fromRow, toRow } from '../src/rows'
import { fakePostgrest } from './postgrest'

const env = { SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_KEY: 'test-secret' }

const OWNER = '7f1c1c52-35a4-4b55-a8a4-3c0b1a9b0001'
const OTHER = '7f1c1c52-35a4-4b55-a8a4-3c0b1a9b0002'

function sms(id: string, ownerId: string | null): MessageRecord<'sms'> {
  return {
    id,
    kind: 'sms',
    type: 'hello',
    data: { to: '+33612345678' },
    context: { name: 'Ann' },
    sender: '+33612000000',
    recipient: '+33612345678',
    ownerId,
    createdAt: new Date('2026-01-02T03:04:05.000Z'),
    sentAt: null,
  }
}

const ID_1 = '0b0c3c5e-8d0e-4c36-9a0e-1d3f5e7a0001'
const ID_2 = '0b0c3c5e-8d0e-4c36-9a0e-1d3f5e7a0002'
const ID_3 = '0b0c3c5e-8d0e-4c36-9a0e-1d3f5e7a0003'

describe('message rows', () => {
  it('maps records to snake_case rows and back', () => {
    const row = toRow(sms(ID_1, OWNER))
    expect(row).toEqual({
      id: ID_1,
      type: 'hello',
      data: { to: '+33612345678' },
      context: { name: 'Ann' },
      sender: '+33612000000',
      recipient: '+33612345678',
      owner_id: OWNER,
      created_at: '2026-01-02T03:04:05.000Z',
      sent_at: null,
    })
    expect(fromRow('sms', row)).toEqual(sms(ID_1, OWNER))
  })

  it('rejects malformed rows', () => {
    expect(() => fromRow('email', { id: 'x' })).toThrow()
  })
})

describe('SupabaseMessageStore', () => {
  it('inserts into the per-kind table and reads back', async () => {
    const server = fakePostgrest()
    const stores = createSupabaseStores(getService(env, server.fetch))

    await stores.sms.insert(sms(ID_1, OWNER))

    expect(server.tables.get('herald_sms')).toHaveLength(1)
    expect(await stores.sms.get(ID_1)).toEqual(sms(ID_1, OWNER))
    expect(await stores.sms.get(ID_2)).toBeNull()
    expect(await stores.email.get(ID_1)).toBeNull()
  })

  it('marks records as sent', async () => {
    const server = fakePostgrest()
    const { sms: store } = createSupabaseStores(getService(env, server.fetch))
    await store.insert(sms(ID_1, null))
    const sentAt = new Date('2026-01-02T03:05:00.000Z')

    const updated = await store.markSent(ID_1, { sentAt, sender: '', recipient: '+33698765432' })

    expect(updated.sentAt).toEqual(sentAt)
    expect(updated.recipient).toBe('+33698765432')
    await expect(store.markSent(ID_2, { sentAt, sender: '', recipient: '' })).rejects.toThrow(`No sms with id ${ID_2}`)
  })

  it('deletes by id and by owner', async () => {
    const server = fakePostgrest()
    const { sms: store } = createSupabaseStores(getService(env, server.fetch))
    await store.insert(sms(ID_1, OWNER))
    await store.insert(sms(ID_2, OWNER))
    await store.insert(sms(ID_3, OTHER))

    expect(await store.deleteByOwner(OWNER)).toBe(2)
    expect(await store.delete(ID_3)).toBe(true)
    expect(await store.delete(ID_3)).toBe(false)
    expect(server.tables.get('herald_sms')).toEqual([])
  })

  it('treats ids that are not uuids as unknown', async () => {
    const server = fakePostgrest()
    const { email: store } = createSupabaseStores(getService(env, server.fetch))

    expect(await store.get('abc')).toBeNull()
    expect(await store.delete('abc')).toBe(false)
    expect(await store.deleteByOwner('abc')).toBe(0)
    await expect(store.markSent('abc', { sentAt: new Date(0), sender: '', recipient: '' })).rejects.toThrow(NotFoundError)
    expect(server.requests).toEqual([])
  })

  it('gets a uuid cast error from the database for malformed ids', async () => {
    const server = fakePostgrest()
    const { error } = await getService(env, server.fetch).from('herald_emails').select('*').eq('id', 'abc')
    expect(error?.code).toBe('22P02')
  })

  it('requires its connection settings', () => {
    expect(() => getService({})).toThrow(/SUPABASE_URL/)
  })
})
