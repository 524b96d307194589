import { z } from 'zod'
import { permalink, toErrorResponse, type Logger, type RenderedView } from '@herald/core'
import type { Demo } from './app'

const SendSchema = z.object({
  kind: z.enum(['email', 'sms']),
  type: z.string().min(1),
  data: z.unknown().default({}),
  ownerId: z.string().min(1).optional(),
})

const EMAIL_PATH = /^\/email\/([^/]+)\.([a-z]+)$/
const SMS_PATH = /^\/sms\/([^/.]+)$/

function viewResponse(view: RenderedView): Response {
  return new Response(view.body, { headers: { 'Content-Type': `${view.contentType}; charset=utf-8` } })
}

/**
 * Request -> Response handlers for re-displaying stored messages and for
 * sending one by type name.
 */
export function createRoutes(demo: Demo, logger: Logger = console) {
  const fail = (e: unknown): Response => {
    const { status, body } = toErrorResponse(e)
    if (status >= 500) logger.error('[herald] request failed', e)
    return Response.json(body, { status })
  }

  return {
    async GET(req: Request): Promise<Response> {
      const { pathname } = new URL(req.url)
      try {
        const email = EMAIL_PATH.exec(pathname)
        if (email) return viewResponse(await demo.email.view(decodeURIComponent(email[1] ?? ''), email[2] ?? ''))
        const sms = SMS_PATH.exec(pathname)
        if (sms) return viewResponse(await demo.sms.view(decodeURIComponent(sms[1] ?? ''), 'txt'))
      } catch (e) {
        return fail(e)
      }
      return Response.json({ error: 'not_found', message: `No route for ${pathname}` }, { status: 404 })
    },

    async POST(req: Request): Promise<Response> {
      const { pathname } = new URL(req.url)
      if (pathname !== '/api/messages/send') {
        return Response.json({ error: 'not_found', message: `No route for ${pathname}` }, { status: 404 })
      }
      const json: unknown = await req.json().catch(() => ({}))
      const parsed = SendSchema.safeParse(json)
      if (!parsed.success) return Response.json({ error: 'invalid_body', message: 'Invalid body' }, { status: 400 })

      const { kind, type, data, ownerId } = parsed.data
      const owner = ownerId ? { id: ownerId } : null
      try {
        const record = kind === 'email' ? await demo.email.send(type, data, owner) : await demo.sms.send(type, data, owner)
        const view = kind === 'email' ? permalink('email', record.id, 'html') : permalink('sms', record.id)
        return Response.json(
          { id: record.id, kind, recipient: record.recipient, sentAt: record.sentAt, view },
          { status: 201, headers: { Location: view } }
        )
      } catch (e) {
        return fail(e)
      }
    },
  }
}
