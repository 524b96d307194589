import { HttpTransportError } from '../errors'

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal }
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>

export type JsonHttpClientOptions = {
  baseUrl: string
  headers?: Record<string, string>
  /** Abort after this many milliseconds; unset leaves it to the transport. */
  timeoutMs?: number
  fetch?: FetchLike
}

export type JsonResponse = { ok: boolean; status: number; body: unknown }

export function basicAuth(user: string, password: string): string {
  return 'Basic ' + Buffer.from(`${user}:${password}`).toString('base64')
}

export function joinUrl(base: string, pathSuffix: string): string {
  const trimmedBase = base.replace(/\/+$/, '')
  const trimmedPath = pathSuffix.startsWith('/') ? pathSuffix : `/${pathSuffix}`
  return `${trimmedBase}${trimmedPath}`
}

export class JsonHttpClient {
  private readonly fetchImpl: FetchLike

  constructor(private readonly options: JsonHttpClientOptions) {
    this.fetchImpl = options.fetch ?? fetch
  }

  /**
   * POSTs `payload` as JSON. Non-2xx answers come back with `ok: false`;
   * only network failures and timeouts throw.
   */
  async post(pathSuffix: string, payload: unknown): Promise<JsonResponse> {
    const url = joinUrl(this.options.baseUrl, pathSuffix)
    const controller = this.options.timeoutMs ? new AbortController() : undefined
    const timeout = controller ? setTimeout(() => controller.abort(), this.options.timeoutMs) : undefined
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.options.headers },
        body: JSON.stringify(payload),
        signal: controller?.signal,
      })
      const body = await response.json().catch(() => null)
      return { ok: response.ok, status: response.status, body }
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e)
      throw new HttpTransportError(`POST ${url} failed: ${message}`, { cause: e })
    } finally {
      if (timeout) clearTimeout(timeout)
    }
  }
}
