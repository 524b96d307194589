import { describe, it, expect } from 'vitest'
import { absolutizeLinks, EmailHtmlProcessor, inlineStyles } from './html'

describe('inlineStyles', () => {
  it('moves tag rules onto the elements', () => {
    expect(inlineStyles('<style>h1 { color: red; }</style><h1>Hi</h1>')).toBe('<h1 style="color:red">Hi</h1>')
  })

  it('handles class and id selectors and keeps existing styles last', () => {
    const html =
      '<style>.note { font-size: 12px } #main{margin:0}</style><p class="note" style="color: blue">x</p><div id="main"></div>'
    expect(inlineStyles(html)).toBe('<p class="note" style="font-size:12px; color:blue">x</p><div id="main" style="margin:0"></div>')
  })

  it('keeps rules that cannot be inlined in one style block', () => {
    const html =
      '<style>p{color:red} @media (max-width:600px){p{font-size:20px}}</style><style>a:hover, a { color: blue }</style><p>a</p><a>b</a>'
    expect(inlineStyles(html)).toBe(
      '<style>@media (max-width:600px){p{font-size:20px}} a:hover{color:blue}</style><p style="color:red">a</p><a style="color:blue">b</a>'
    )
  })

  it('matches unquoted class attributes', () => {
    expect(inlineStyles('<style>.note{margin:0}</style><p class=note>x</p>')).toBe('<p class=note style="margin:0">x</p>')
  })

  it('leaves markup without style blocks alone', () => {
    expect(inlineStyles('<p>plain</p>')).toBe('<p>plain</p>')
  })
})

describe('absolutizeLinks', () => {
  const html =
    '<a href="/welcome">w</a><a href="#top">t</a><a href="tel:+33612345678">c</a><img src="cid:logo"><img src="img/a.png">'

  it('rewrites relative links against the base URL', () => {
    expect(absolutizeLinks(html, 'https://example.org/mail/', { preserveInternalLinks: true, preserveInlineImages: true })).toBe(
      '<a href="https://example.org/welcome">w</a><a href="#top">t</a><a href="tel:+33612345678">c</a>' +
        '<img src="cid:logo"><img src="https://example.org/mail/img/a.png">'
    )
  })

  it('rewrites unquoted attribute values', () => {
    expect(absolutizeLinks('<a href=/x>x</a><img src=logo.png>', 'https://example.org')).toBe(
      '<a href=https://example.org/x>x</a><img src=https://example.org/logo.png>'
    )
  })

  it('rewrites fragment links unless internal links are preserved', () => {
    expect(absolutizeLinks('<a href="#top">t</a>', 'https://example.org/mail/')).toBe('<a href="https://example.org/mail/#top">t</a>')
  })
})

describe('EmailHtmlProcessor', () => {
  it('inlines then absolutizes', () => {
    const processor = new EmailHtmlProcessor({ preserveInternalLinks: true })
    expect(processor.process('<style>a { color: red }</style><a href="/x">x</a>', 'https://example.org')).toBe(
      '<a href="https://example.org/x" style="color:red">x</a>'
    )
  })
})
