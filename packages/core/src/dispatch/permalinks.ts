export type EmailViewFormat = 'html' | 'txt'

export function emailPermalink(id: string, format: EmailViewFormat): string {
  return `/email/${encodeURIComponent(id)}.${format}`
}

export function smsPermalink(id: string): string {
  return `/sms/${encodeURIComponent(id)}`
}

export function permalink(kind: 'email', id: string, format: EmailViewFormat): string
export function permalink(kind: 'sms', id: string): string
export function permalink(kind: 'email' | 'sms', id: string, format: EmailViewFormat = 'html'): string {
  return kind === 'email' ? emailPermalink(id, format) : smsPermalink(id)
}
