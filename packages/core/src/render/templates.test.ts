import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { beforeAll, describe, it, expect } from 'vitest'
import { FileTemplateRenderer, lookupPath } from './templates'
import { Translator } from '../i18n/translator'
import { withLocale } from '../i18n/locale'
import { TemplateError } from '../errors'

let root: string

beforeAll(() => {
  root = mkdtempSync(path.join(tmpdir(), 'herald-templates-'))
  const files: Record<string, string> = {
    'greet.txt': 'Hi {{ user.name }}, {{ t "Hello {name}" }}\n',
    'greet.html': '<p>{{ user.name }}</p>',
    'styled.html': '{{ style "mail.css" }}<h1>x</h1>',
    'mail.css': 'h1 { color: red; }\n',
    'missing.txt': '[{{ missing.value }}]',
    'broken.txt': '{{ 1 + 2 }}',
    'inherited.txt': '[{{ constructor }}|{{ t "Hi {toString}" }}]',
  }
  for (const [name, body] of Object.entries(files)) writeFileSync(path.join(root, name), body)
})

function renderer() {
  const translator = new Translator({ fr: { 'Hello {name}': 'Salut {name}' } })
  return new FileTemplateRenderer({ root, translator })
}

describe('FileTemplateRenderer', () => {
  it('substitutes values and translates in the active locale', async () => {
    const out = await withLocale('fr', () => renderer().render('greet.txt', { user: { name: 'A & B' }, name: 'Jo' }))
    expect(out).toBe('Hi A & B, Salut Jo\n')
  })

  it('escapes values in HTML templates', async () => {
    expect(await renderer().render('greet.html', { user: { name: 'A & B' } })).toBe('<p>A &amp; B</p>')
  })

  it('embeds style sheets', async () => {
    expect(await renderer().render('styled.html', {})).toBe('<style type="text/css">\nh1 { color: red; }\n</style><h1>x</h1>')
  })

  it('renders missing values as empty', async () => {
    expect(await renderer().render('missing.txt', {})).toBe('[]')
  })

  it('ignores inherited properties of the context', async () => {
    expect(await renderer().render('inherited.txt', {})).toBe('[|Hi {toString}]')
  })

  it('fails on unknown templates and unparseable tags', async () => {
    await expect(renderer().render('nope.txt', {})).rejects.toThrow('Template "nope.txt" cannot be found')
    await expect(renderer().render('broken.txt', {})).rejects.toThrow(TemplateError)
    await expect(renderer().render('../outside.txt', {})).rejects.toThrow(TemplateError)
  })
})

describe('lookupPath', () => {
  it('walks nested objects', () => {
    expect(lookupPath({ a: { b: { c: 1 } } }, 'a.b.c')).toBe(1)
    expect(lookupPath({ a: null }, 'a.b')).toBeUndefined()
    expect(lookupPath({ a: {} }, 'a.constructor')).toBeUndefined()
  })
})
