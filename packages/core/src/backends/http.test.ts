import { describe, it, expect } from 'vitest'
import { basicAuth, joinUrl, JsonHttpClient, type FetchLike } from './http'
import { HttpTransportError } from '../errors'

type Call = { url: string; headers: Record<string, string>; body: unknown }

function recordingFetch(reply: { ok: boolean; status: number; json(): Promise<unknown> }) {
  const calls: Call[] = []
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, headers: init.headers, body: JSON.parse(init.body) })
    return reply
  }
  return { calls, fetch }
}

describe('JsonHttpClient', () => {
  it('posts JSON with the default headers', async () => {
    const { calls, fetch } = recordingFetch({ ok: true, status: 200, json: async () => ({ done: true }) })
    const client = new JsonHttpClient({ baseUrl: 'https://api.example.com/', headers: { Authorization: basicAuth('a', 'b') }, fetch })

    const res = await client.post('/v3.1/send', { hello: 'world' })

    expect(res).toEqual({ ok: true, status: 200, body: { done: true } })
    expect(calls).toEqual([
      {
        url: 'https://api.example.com/v3.1/send',
        headers: { 'Content-Type': 'application/json', Authorization: 'Basic YTpi' },
        body: { hello: 'world' },
      },
    ])
  })

  it('returns a null body when the answer is not JSON', async () => {
    const { fetch } = recordingFetch({ ok: false, status: 502, json: async () => Promise.reject(new SyntaxError('bad json')) })
    const client = new JsonHttpClient({ baseUrl: 'https://api.example.com', fetch })
    expect(await client.post('x', {})).toEqual({ ok: false, status: 502, body: null })
  })

  it('wraps network failures', async () => {
    const fetch: FetchLike = async () => Promise.reject(new Error('ECONNREFUSED'))
    const client = new JsonHttpClient({ baseUrl: 'https://api.example.com', fetch })
    await expect(client.post('x', {})).rejects.toThrow(HttpTransportError)
  })

  it('aborts after the timeout', async () => {
    const fetch: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const client = new JsonHttpClient({ baseUrl: 'https://api.example.com', timeoutMs: 10, fetch })
    await expect(client.post('x', {})).rejects.toThrow('POST https://api.example.com/x failed: aborted')
  })
})

describe('joinUrl', () => {
  it('joins with a single slash', () => {
    expect(joinUrl('https://a.example/', 'b')).toBe('https://a.example/b')
    expect(joinUrl('https://a.example', '/b')).toBe('https://a.example/b')
  })
})
