/**
 * PageFetcher: fetch one URL and extract its title, text and links.
 *
 * HttpPageFetcher uses the global fetch and plain pattern matching: it pulls
 * `href` targets and visible text out of HTML and does not render or run
 * anything.
 */

import { RetryableError, TerminalError } from '../../core/errors.js'

export interface FetchedPage {
  /** Final URL after redirects */
  url: string
  status: number
  title: string | null
  content: string
  /** Absolute http(s) links, without fragments, de-duplicated, in page order */
  links: string[]
}

export interface PageFetcher {
  /**
   * @throws {RetryableError} for network errors, timeouts, 429 and 5xx
   * @throws {TerminalError} (FETCH_FAILED) for other non-2xx responses
   */
  fetch(url: string, signal: AbortSignal): Promise<FetchedPage>
}

export interface HttpPageFetcherOptions {
  userAgent: string
  requestTimeoutMs: number
  /** Bodies longer than this are truncated before extraction */
  maxBodyBytes: number
}

export class HttpPageFetcher implements PageFetcher {
  private readonly _options: HttpPageFetcherOptions

  constructor(options: HttpPageFetcherOptions) {
    this._options = options
  }

  async fetch(url: string, signal: AbortSignal): Promise<FetchedPage> {
    let response: Response
    try {
      response = await fetch(url, {
        headers: { 'user-agent': this._options.userAgent, accept: 'text/html,text/plain;q=0.9,*/*;q=0.5' },
        redirect: 'follow',
        signal: AbortSignal.any([signal, AbortSignal.timeout(this._options.requestTimeoutMs)]),
      })
    } catch (err) {
      if (signal.aborted) throw err
      const message = err instanceof Error ? err.message : String(err)
      throw new RetryableError(`Fetching ${url} failed: ${message}`, { url })
    }

    if (response.status === 429 || response.status >= 500) {
      throw new RetryableError(`Fetching ${url} returned ${String(response.status)}`, { url, status: response.status })
    }
    if (!response.ok) {
      throw new TerminalError(`Fetching ${url} returned ${String(response.status)}`, 'FETCH_FAILED', {
        url,
        status: response.status,
      })
    }

    const body = (await response.text()).slice(0, this._options.maxBodyBytes)
    const finalUrl = response.url === '' ? url : response.url
    const contentType = response.headers.get('content-type') ?? ''
    if (!contentType.includes('html')) {
      return { url: finalUrl, status: response.status, title: null, content: body.trim(), links: [] }
    }
    return { url: finalUrl, status: response.status, ...extractHtml(body, finalUrl) }
  }
}

// ---------------------------------------------------------------------------
// HTML extraction
// ---------------------------------------------------------------------------

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
}

function decodeEntities(text: string): string {
  return text.replace(/&(#\d+|[a-z]+);/gi, (match, name: string) => {
    if (name.startsWith('#')) {
      const code = Number(name.slice(1))
      return Number.isFinite(code) ? String.fromCodePoint(code) : match
    }
    return ENTITIES[name.toLowerCase()] ?? match
  })
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function extractHtml(html: string, baseUrl: string): Pick<FetchedPage, 'title' | 'content' | 'links'> {
  const rawTitle = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1]
  const title = rawTitle === undefined ? null : collapse(decodeEntities(rawTitle)) || null

  const links: string[] = []
  const seen = new Set<string>()
  for (const match of html.matchAll(/<a\b[^>]*?\bhref\s*=\s*["']([^"']+)["']/gi)) {
    const href = match[1]
    if (href === undefined) continue
    const absolute = resolveLink(decodeEntities(href), baseUrl)
    if (absolute !== null && !seen.has(absolute)) {
      seen.add(absolute)
      links.push(absolute)
    }
  }

  const content = collapse(
    decodeEntities(
      html
        .replace(/<(script|style|noscript|head|title)\b[\s\S]*?<\/\1>/gi, ' ')
        .replace(/<[^>]+>/g, ' '),
    ),
  )

  return { title, content, links }
}

export function resolveLink(href: string, baseUrl: string): string | null {
  let url: URL
  try {
    url = new URL(href, baseUrl)
  } catch {
    return null
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null
  url.hash = ''
  return url.toString()
}
