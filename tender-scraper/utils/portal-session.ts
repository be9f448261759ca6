/**
 * Cookie-keeping HTTP session for NIC eProcurement portals.
 *
 * The portal ties navigation state to a server-side session; when that
 * session expires every page renders a "timed out" notice instead of content,
 * so the session is restarted and the page requested once more.
 */

import type { PortalConfig } from '../types'

export const SESSION_TIMEOUT_MARKER = 'Your session has timed out'

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export interface PageSource {
  fetchPage(url: string): Promise<string | null>
}

export class PortalSession implements PageSource {
  private readonly cookies = new Map<string, string>()

  constructor(
    private readonly portal: PortalConfig,
    private readonly fetchImpl: FetchFn = (url, init) => fetch(url, init)
  ) {}

  async fetchPage(url: string): Promise<string | null> {
    console.log(`[${this.portal.name}] Fetching URL: ${url}`)

    try {
      let body = await this.get(url)

      if (body.includes(SESSION_TIMEOUT_MARKER)) {
        console.warn(`[${this.portal.name}] Session timed out. Restarting session for URL: ${url}`)
        await this.restart()
        body = await this.get(url)
      }

      return body
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error'
      console.error(`[${this.portal.name}] Error fetching ${url}: ${errorMessage}`)
      return null
    }
  }

  cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ')
  }

  private async restart(): Promise<void> {
    const response = await this.request(`${this.portal.baseUrl}${this.portal.restartPath}`)
    if (!response.ok) {
      console.warn(`[${this.portal.name}] Session restart returned HTTP ${response.status}`)
    }
  }

  private async get(url: string): Promise<string> {
    const response = await this.request(url)
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim())
    }
    return response.text()
  }

  private async request(url: string): Promise<Response> {
    const headers: Record<string, string> = { 'User-Agent': this.portal.userAgent }
    const cookie = this.cookieHeader()
    if (cookie) headers.Cookie = cookie

    const response = await this.fetchImpl(url, {
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.portal.timeout),
    })
    this.storeCookies(response)
    return response
  }

  private storeCookies(response: Response): void {
    for (const setCookie of response.headers.getSetCookie()) {
      const pair = setCookie.split(';')[0]
      const separator = pair.indexOf('=')
      if (separator <= 0) continue
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim())
    }
  }
}
