import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { TemplateRenderer } from '../index'
import { TemplateError } from '../errors'
import type { Translator } from '../i18n/translator'

export type TemplateContext = Record<string, unknown>

const TAG = /\{\{\s*([\s\S]*?)\s*\}\}/g
const CALL = /^(t|style)\s+"((?:[^"\\]|\\.)*)"$/
const PATH = /^[A-Za-z_][\w]*(?:\.[\w]+)*$/

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c)
}

export function lookupPath(context: TemplateContext, dotted: string): unknown {
  let current: unknown = context
  for (const part of dotted.split('.')) {
    if (current === null || typeof current !== 'object' || !Object.hasOwn(current, part)) return undefined
    current = Reflect.get(current, part)
  }
  return current
}

function display(value: unknown): string {
  if (value == null) return ''
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

/**
 * Renders templates stored as files under `root`.
 *
 *   {{ user.name }}      value lookup, escaped in .html templates
 *   {{ t "Hi {name}" }}  translated in the active locale, then filled from the context
 *   {{ style "a.css" }}  the style sheet wrapped in a <style> tag
 */
export class FileTemplateRenderer implements TemplateRenderer {
  private readonly cache = new Map<string, Promise<string>>()

  constructor(private readonly options: { root: string; translator: Translator; cache?: boolean }) {}

  async render(templateId: string, context: TemplateContext): Promise<string> {
    const source = await this.load(templateId, 'Template')
    const isHtml = templateId.endsWith('.html')
    const escape = (s: string) => (isHtml ? escapeHtml(s) : s)

    const pieces: Array<string | Promise<string>> = []
    let last = 0
    for (const match of source.matchAll(TAG)) {
      const index = match.index ?? 0
      pieces.push(source.slice(last, index))
      pieces.push(this.expand(match[1] ?? '', context, escape, templateId))
      last = index + match[0].length
    }
    pieces.push(source.slice(last))
    return (await Promise.all(pieces)).join('')
  }

  private async expand(
    expression: string,
    context: TemplateContext,
    escape: (s: string) => string,
    templateId: string
  ): Promise<string> {
    const call = CALL.exec(expression)
    if (call) {
      const [, fn, rawArg] = call
      const arg = (rawArg ?? '').replace(/\\(.)/g, '$1')
      if (fn === 't') {
        const translated = this.options.translator.lookup(arg)
        return escape(translated.replace(/\{(\w+)\}/g, (whole, key: string) => (Object.hasOwn(context, key) ? display(context[key]) : whole)))
      }
      const css = await this.load(arg, 'Style file')
      return `<style type="text/css">\n${css}</style>`
    }
    if (PATH.test(expression)) return escape(display(lookupPath(context, expression)))
    throw new TemplateError(`Cannot parse "{{ ${expression} }}" in ${templateId}`)
  }

  private load(name: string, what: string): Promise<string> {
    const file = path.resolve(this.options.root, name)
    if (!file.startsWith(path.resolve(this.options.root) + path.sep)) {
      return Promise.reject(new TemplateError(`${what} "${name}" is outside the template root`))
    }
    const cached = this.options.cache === false ? undefined : this.cache.get(file)
    if (cached) return cached
    const loading = readFile(file, 'utf8').catch((e: unknown) => {
      this.cache.delete(file)
      throw new TemplateError(`${what} "${name}" cannot be found`, { cause: e })
    })
    if (this.options.cache !== false) this.cache.set(file, loading)
    return loading
  }
}
