import type { HtmlProcessor } from '../index'

export type HtmlProcessorOptions = {
  preserveInternalLinks?: boolean
  preserveInlineImages?: boolean
}

type StyleRule = { selector: string; declarations: string }

type Stylesheet = { rules: StyleRule[]; kept: string[] }

const STYLE_BLOCK = /<style[^>]*>([\s\S]*?)<\/style>/gi
const OPEN_TAG = /<([a-zA-Z][\w-]*)(\s[^<>]*?)?(\/?)>/g
const URL_ATTR = /(\s)(href|src)(\s*=\s*)(?:(["'])(.*?)\4|([^\s"'>]+))/gi
const SIMPLE_SELECTOR = /^[a-zA-Z][\w-]*$|^\.[\w-]+$|^#[\w-]+$/

function normalizeDeclarations(css: string): string {
  return css
    .split(';')
    .map((d) => d.trim())
    .filter(Boolean)
    .map((d) => {
      const colon = d.indexOf(':')
      if (colon === -1) return d
      return `${d.slice(0, colon).trim()}:${d.slice(colon + 1).trim()}`
    })
    .join('; ')
}

// Top-level `prelude { body }` blocks, with nested braces kept inside the body
function* blocks(css: string): Generator<{ prelude: string; body?: string }, void> {
  let depth = 0
  let prelude = ''
  let body = ''
  for (const ch of css) {
    if (depth === 0) {
      if (ch === '{') depth = 1
      else if (ch === ';' && prelude.trim().startsWith('@')) {
        yield { prelude: prelude.trim() }
        prelude = ''
      } else prelude += ch
      continue
    }
    if (ch === '{') depth++
    if (ch === '}') depth--
    if (depth === 0) {
      yield { prelude: prelude.trim(), body: body.trim() }
      prelude = ''
      body = ''
    } else body += ch
  }
}

function parseStylesheet(html: string): Stylesheet {
  const sheet: Stylesheet = { rules: [], kept: [] }
  for (const block of html.matchAll(STYLE_BLOCK)) {
    const css = (block[1] ?? '').replace(/\/\*[\s\S]*?\*\//g, '')
    for (const { prelude, body } of blocks(css)) {
      if (body === undefined) {
        sheet.kept.push(`${prelude};`)
        continue
      }
      if (prelude.startsWith('@')) {
        sheet.kept.push(`${prelude}{${body}}`)
        continue
      }
      const declarations = normalizeDeclarations(body)
      if (!declarations) continue
      const selectors = prelude.split(',').map((s) => s.trim())
      const rest = selectors.filter((s) => !SIMPLE_SELECTOR.test(s))
      for (const selector of selectors.filter((s) => SIMPLE_SELECTOR.test(s))) sheet.rules.push({ selector, declarations })
      if (rest.length > 0) sheet.kept.push(`${rest.join(', ')}{${declarations}}`)
    }
  }
  return sheet
}

function attr(attrs: string, name: string): string | undefined {
  const m = new RegExp(`\\s${name}\\s*=\\s*(?:(["'])(.*?)\\1|([^\\s"'>]+))`, 'i').exec(attrs)
  return m?.[2] ?? m?.[3]
}

function matches(rule: StyleRule, tag: string, attrs: string): boolean {
  if (rule.selector.startsWith('.')) {
    return (attr(attrs, 'class') ?? '').split(/\s+/).includes(rule.selector.slice(1))
  }
  if (rule.selector.startsWith('#')) return attr(attrs, 'id') === rule.selector.slice(1)
  return rule.selector.toLowerCase() === tag.toLowerCase()
}

/**
 * Moves `<style>` rules onto the matching elements (tag, .class and #id
 * selectors). Rules that cannot be inlined, such as `@media` blocks and
 * pseudo-classes, stay behind in a single `<style>` block where the first one
 * was. Inline styles already present win.
 */
export function inlineStyles(html: string): string {
  const { rules, kept } = parseStylesheet(html)
  let pending = kept.length > 0
  const stripped = html.replace(STYLE_BLOCK, () => {
    if (!pending) return ''
    pending = false
    return `<style>${kept.join(' ')}</style>`
  })
  if (rules.length === 0) return stripped

  return stripped.replace(OPEN_TAG, (whole, tag: string, rawAttrs: string | undefined, selfClose: string) => {
    const attrs = rawAttrs ?? ''
    const applied = rules.filter((r) => matches(r, tag, attrs)).map((r) => r.declarations)
    if (applied.length === 0) return whole
    const existing = attr(attrs, 'style')
    const style = [...applied, ...(existing ? [normalizeDeclarations(existing)] : [])].join('; ')
    const rest = attrs.replace(/\sstyle\s*=\s*(?:(["']).*?\1|[^\s"'>]+)/i, '')
    return `<${tag}${rest} style="${style}"${selfClose}>`
  })
}

export function absolutizeLinks(html: string, baseUrl: string, options: HtmlProcessorOptions = {}): string {
  return html.replace(URL_ATTR, (
    whole,
    space: string,
    name: string,
    eq: string,
    quote: string | undefined,
    quoted: string | undefined,
    bare: string | undefined
  ) => {
    const target = (quoted ?? bare ?? '').trim()
    const isHref = name.toLowerCase() === 'href'
    if (!target) return whole
    if (isHref && /^tel:/i.test(target)) return whole
    if (isHref && target.startsWith('#') && options.preserveInternalLinks) return whole
    if (!isHref && /^cid:/i.test(target) && options.preserveInlineImages) return whole
    try {
      const q = quote ?? ''
      return `${space}${name}${eq}${q}${new URL(target, baseUrl).toString()}${q}`
    } catch {
      return whole
    }
  })
}

export class EmailHtmlProcessor implements HtmlProcessor {
  constructor(private readonly options: HtmlProcessorOptions = {}) {}

  process(html: string, baseUrl: string): string {
    return absolutizeLinks(inlineStyles(html), baseUrl, this.options)
  }
}
