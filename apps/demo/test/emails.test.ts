import { describe, it, expect } from 'vitest'
import { currentLocale } from '@herald/core'
import { john, SENT_AT, setup } from './setup'

const STATIC_HTML = '<!DOCTYPE html>\n<html>\n<body>\n<p>Static HTML en français</p>\n</body>\n</html>\n'

describe('static emails', () => {
  it('renders both parts in the type locale', async () => {
    const { demo, outbox } = setup()
    const record = await demo.email.send('static', {})

    expect(record.context).toEqual({ prefix: 'Static' })
    expect(outbox.email.outbox).toHaveLength(1)
    expect(outbox.email.outbox[0]).toEqual({
      from: 'webmaster@localhost',
      to: ['foo@bar.com'],
      cc: [],
      bcc: [],
      subject: 'Static Subject',
      text: 'Static Text en français\n',
      html: STATIC_HTML,
      attachments: [],
      headers: {},
    })
    expect(currentLocale()).toBe('en')
  })

  it('omits the text part', async () => {
    const { demo, outbox } = setup()
    await demo.email.send('static-no-text', {})
    expect(outbox.email.outbox[0]?.text).toBeUndefined()
    expect(outbox.email.outbox[0]?.html).toBe(STATIC_HTML)
  })

  it('omits the HTML part', async () => {
    const { demo, outbox } = setup()
    await demo.email.send('static-no-html', {})
    expect(outbox.email.outbox[0]?.html).toBeUndefined()
    expect(outbox.email.outbox[0]?.text).toBe('Static Text en français\n')
  })

  it('inlines the style sheet', async () => {
    const { demo, outbox } = setup()
    await demo.email.send('styled-html', {})
    const html = outbox.email.outbox[0]?.html ?? ''
    expect(html).toContain('<h1 style="color:red">Hello</h1>')
    expect(html).not.toContain('<style')
  })

  it('builds absolute URLs from the site domain', async () => {
    const { demo, outbox } = setup()
    await demo.email.send('absolute-url', {})
    expect(outbox.email.outbox[0]?.text).toBe('Reviens à la maison : https://example.com/\n')
  })

  it('prefers the configured base URL', async () => {
    const { demo, outbox } = setup({ baseUrl: 'https://mail.example.net' })
    await demo.email.send('absolute-url', {})
    expect(outbox.email.outbox[0]?.text).toBe('Reviens à la maison : https://mail.example.net/\n')
  })
})

describe('hello', () => {
  const data = { first_name: 'John', last_name: 'Doe', email: 'john.doe@example.org', locale: 'fr' }

  it('greets in French', async () => {
    const { demo, outbox } = setup()
    const record = await demo.email.send('hello', data)
    const [sent] = outbox.email.outbox

    expect(sent?.subject).toBe('Salut John Doe')
    expect(sent?.to).toEqual(['john.doe@example.org'])
    expect(sent?.text).toBe('Salut John Doe!\n\nÀ plus la pluche\n')
    expect(sent?.html).toContain('<h1 style="color:red">Bonjour, John Doe!</h1>')
    expect(sent?.html).toContain(
      `<p class="footer" style="font-size:12px"><a href="https://example.com/email/${record.id}.html">Voir dans le navigateur</a></p>`
    )
  })

  it('greets in English', async () => {
    const { demo, outbox } = setup()
    await demo.email.send('hello', { ...data, locale: 'en' })
    expect(outbox.email.outbox[0]?.subject).toBe('Hello John Doe')
    expect(outbox.email.outbox[0]?.text).toBe('Hello John Doe!\n\nSee you later\n')
  })
})

describe('hello-user', () => {
  it('reads the user once and freezes name and locale', async () => {
    const { demo, outbox } = setup()
    const record = await demo.email.send('hello-user', { user_id: 'u1' }, { id: 'u1' })

    expect(record).toMatchObject({
      recipient: 'john.doe@example.org',
      context: { name: 'John Doe', locale: 'fr' },
      ownerId: 'u1',
      sentAt: SENT_AT,
    })
    expect(outbox.email.outbox[0]?.subject).toBe('Salut John Doe')
    expect(outbox.email.outbox[0]?.text).toBe('Salut John Doe!\n\nÀ plus la pluche\n')
  })

  it('keeps the frozen name after the user changes', async () => {
    const { demo, users, outbox } = setup()
    const record = await demo.email.send('hello-user', { user_id: 'u1' }, { id: 'u1' })

    users.save({ ...john, firstName: 'Jack', email: 'jack@example.org', locale: 'en' })
    const { record: resent } = await demo.email.resend(record.id)

    expect(outbox.email.outbox[1]?.subject).toBe('Salut John Doe')
    expect(outbox.email.outbox[1]?.to).toEqual(['jack@example.org'])
    expect(resent.recipient).toBe('jack@example.org')
  })

  it('goes away with its user', async () => {
    const { demo } = setup()
    const record = await demo.email.send('hello-user', { user_id: 'u1' }, { id: 'u1' })
    await demo.email.send('static', {})

    expect(await demo.deleteUser('u1')).toBe(1)
    expect(await demo.stores.email.get(record.id)).toBeNull()
  })

  it('needs a user id', async () => {
    const { demo } = setup()
    await expect(demo.email.send('hello-user', {})).rejects.toThrow('Invalid data for type "hello-user": user_id is required')
  })
})
