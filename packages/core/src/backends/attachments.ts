import type { Attachment } from '../index'

export type EncodedAttachment = { filename: string; contentType: string; base64: string }

export function encodeAttachment(attachment: Attachment): EncodedAttachment {
  const bytes = typeof attachment.content === 'string' ? Buffer.from(attachment.content, 'utf8') : Buffer.from(attachment.content)
  return {
    filename: attachment.filename,
    contentType: attachment.contentType,
    base64: bytes.toString('base64'),
  }
}
