import { describe, it, expect, vi, afterEach } from 'vitest'
import { GoogleCustomSearchProvider } from '../providers/google-custom.js'
import { SerpApiSearchProvider, formatTbsDate } from '../providers/serpapi.js'
import { SerperSearchProvider } from '../providers/serper.js'
import { TokenBucket } from '../rate-limiter.js'
import { ApiError, ConfigError, RateLimitError, ValidationError } from '../../errors.js'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })
}

function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })
}

function googleItems(start: number, count: number) {
  return Array.from({ length: count }, (_, i) => ({
    link: `https://site${start + i}.example/page`,
    title: `Result ${start + i}`,
    snippet: `Snippet ${start + i}`,
  }))
}

function requestedUrl(input: string): URL {
  return new URL(input)
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('GoogleCustomSearchProvider', () => {
  function stubGoogle(total = '1000') {
    const fetchMock = vi.fn(async (input: string) => {
      const url = requestedUrl(input)
      const start = Number(url.searchParams.get('start'))
      const num = Number(url.searchParams.get('num'))
      return jsonResponse({ items: googleItems(start, num), searchInformation: { totalResults: total } })
    })
    vi.stubGlobal('fetch', fetchMock)
    return fetchMock
  }

  it('pages through results with 1-based offsets and assigns ranks 1..n', async () => {
    const fetchMock = stubGoogle()
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('climate policy', 25)

    expect(fetchMock).toHaveBeenCalledTimes(3)
    const pages = fetchMock.mock.calls.map(([input]) => {
      const url = requestedUrl(input)
      return [url.searchParams.get('start'), url.searchParams.get('num')]
    })
    expect(pages).toEqual([
      ['1', '10'],
      ['11', '10'],
      ['21', '5'],
    ])
    expect(hits).toHaveLength(25)
    expect(hits.map((hit) => hit.rank)).toEqual(Array.from({ length: 25 }, (_, i) => i + 1))
    expect(hits[24]).toEqual({
      url: 'https://site25.example/page',
      title: 'Result 25',
      description: 'Snippet 25',
      rank: 25,
      domain: 'site25.example',
    })
    expect(Object.isFrozen(hits[0])).toBe(true)
  })

  it('sends credentials and search options as query parameters', async () => {
    const fetchMock = stubGoogle()
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    await provider.search('  energy  ', 3, { language: 'lang_da', country: 'dk', locale: 'da', safeSearch: true })

    const url = requestedUrl(fetchMock.mock.calls[0][0])
    expect(url.origin + url.pathname).toBe('https://www.googleapis.com/customsearch/v1')
    expect(Object.fromEntries(url.searchParams)).toEqual({
      key: 'test-key',
      cx: 'test-cx',
      q: 'energy',
      num: '3',
      start: '1',
      lr: 'lang_da',
      gl: 'dk',
      hl: 'da',
      safe: 'active',
    })
  })

  it('clamps requests above the cap of 100', async () => {
    const fetchMock = stubGoogle()
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('q', 250)

    expect(hits).toHaveLength(100)
    expect(hits[99].rank).toBe(100)
    expect(fetchMock).toHaveBeenCalledTimes(10)
  })

  it('keeps paging after a short page', async () => {
    const fetchMock = vi.fn(async (input: string) => {
      const start = Number(requestedUrl(input).searchParams.get('start'))
      const num = Number(requestedUrl(input).searchParams.get('num'))
      const count = start === 1 ? 9 : num
      return jsonResponse({ items: googleItems(start, count), searchInformation: { totalResults: '1000' } })
    })
    vi.stubGlobal('fetch', fetchMock)
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('q', 25)

    expect(hits).toHaveLength(25)
    expect(fetchMock.mock.calls.map(([input]) => requestedUrl(input).searchParams.get('start'))).toEqual([
      '1',
      '10',
      '20',
    ])
    expect(hits[24]).toMatchObject({ url: 'https://site25.example/page', rank: 25 })
  })

  it('stops on an empty page', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ items: googleItems(1, 4) }))
      .mockResolvedValueOnce(jsonResponse({ items: [] }))
    vi.stubGlobal('fetch', fetchMock)
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('q', 50)

    expect(hits).toHaveLength(4)
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('stops at the total the API reports', async () => {
    const fetchMock = stubGoogle('12')
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('q', 40)

    // page 2 asks for 10 more; the stub still returns 10
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(hits).toHaveLength(20)
  })

  it('skips malformed items without breaking ranks', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(
          jsonResponse({
            items: [
              { link: 'https://a.example/', title: 'A' },
              { title: 'no link' },
              { link: 'https://b.example/', title: 'B', snippet: 'b' },
            ],
          })
        )
        .mockResolvedValueOnce(jsonResponse({}))
    )
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    const hits = await provider.search('q', 10)

    expect(hits.map((hit) => [hit.rank, hit.url, hit.description])).toEqual([
      [1, 'https://a.example/', ''],
      [2, 'https://b.example/', 'b'],
    ])
  })

  it('returns nothing for maxResults below 1 and rejects empty queries', async () => {
    const fetchMock = stubGoogle()
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    await expect(provider.search('q', 0)).resolves.toEqual([])
    await expect(provider.search('   ', 10)).rejects.toBeInstanceOf(ValidationError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('requires an API key and an engine id', () => {
    expect(() => new GoogleCustomSearchProvider({ apiKey: 'test-key' })).toThrow(ConfigError)
  })

  it('maps upstream status codes onto the error taxonomy', async () => {
    const provider = new GoogleCustomSearchProvider({ apiKey: 'test-key', searchEngineId: 'test-cx' })

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'bad key' }, 401)))
    await expect(provider.search('q', 5)).rejects.toBeInstanceOf(ConfigError)

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'Daily Limit Exceeded' }, 403)))
    await expect(provider.search('q', 5)).rejects.toBeInstanceOf(RateLimitError)

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'forbidden' }, 403)))
    await expect(provider.search('q', 5)).rejects.toBeInstanceOf(ConfigError)

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 429)))
    await expect(provider.search('q', 5)).rejects.toBeInstanceOf(RateLimitError)

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 502)))
    await expect(provider.search('q', 5)).rejects.toMatchObject({
      name: 'ApiError',
      statusCode: 502,
    })
  })

  it('refuses requests once its token bucket is empty', async () => {
    const fetchMock = stubGoogle()
    const provider = new GoogleCustomSearchProvider({
      apiKey: 'test-key',
      searchEngineId: 'test-cx',
      limiter: new TokenBucket({ capacity: 1, periodSeconds: 3600 }),
    })

    await expect(provider.search('q', 20)).rejects.toBeInstanceOf(RateLimitError)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(provider.getRateLimiterState().availableTokens).toBeLessThan(1)
  })
})

describe('SerperSearchProvider', () => {
  function organic(page: number) {
    return Array.from({ length: 10 }, (_, i) => ({
      link: `https://news${(page - 1) * 10 + i + 1}.example/`,
      title: `News ${(page - 1) * 10 + i + 1}`,
    }))
  }

  it('posts page numbers with a fixed page size and truncates the last page', async () => {
    const bodies: unknown[] = []
    const fetchMock = vi.fn(async (_input: string, init?: { body?: unknown; headers?: Record<string, string> }) => {
      const body: unknown = JSON.parse(String(init?.body))
      bodies.push(body)
      const page = typeof body === 'object' && body !== null && 'page' in body ? Number(body.page) : 1
      return jsonResponse({ organic: organic(page) })
    })
    vi.stubGlobal('fetch', fetchMock)
    const provider = new SerperSearchProvider({ apiKey: 'test-key' })

    const hits = await provider.search('wind power', 25, { country: 'dk', locale: 'da' })

    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(bodies).toEqual([
      { q: 'wind power', num: 10, page: 1, gl: 'dk', hl: 'da' },
      { q: 'wind power', num: 10, page: 2, gl: 'dk', hl: 'da' },
      { q: 'wind power', num: 10, page: 3, gl: 'dk', hl: 'da' },
    ])
    expect(hits).toHaveLength(25)
    expect(hits[24].url).toBe('https://news25.example/')
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ 'X-API-KEY': 'test-key' })
  })

  it('retries timeouts with exponential backoff', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(abortError())
      .mockRejectedValueOnce(abortError())
      .mockResolvedValue(jsonResponse({ organic: organic(1) }))
    vi.stubGlobal('fetch', fetchMock)
    const sleep = vi.fn().mockResolvedValue(undefined)
    const provider = new SerperSearchProvider({ apiKey: 'test-key', maxRetries: 2, sleep })

    const hits = await provider.search('q', 10)

    expect(hits).toHaveLength(10)
    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[2000], [4000]])
  })

  it('gives up with an ApiError once retries are exhausted', async () => {
    const fetchMock = vi.fn().mockRejectedValue(abortError())
    vi.stubGlobal('fetch', fetchMock)
    const sleep = vi.fn().mockResolvedValue(undefined)
    const provider = new SerperSearchProvider({ apiKey: 'test-key', maxRetries: 1, sleep })

    const error = await provider.search('q', 10).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({ message: 'serper: request timed out after 2 attempts (timeout 30s)' })
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(sleep.mock.calls).toEqual([[2000]])
  })

  it('does not retry non-timeout failures', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 500))
    vi.stubGlobal('fetch', fetchMock)
    const sleep = vi.fn().mockResolvedValue(undefined)
    const provider = new SerperSearchProvider({ apiKey: 'test-key', sleep })

    await expect(provider.search('q', 10)).rejects.toBeInstanceOf(ApiError)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('reads related searches and people-also-ask questions', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({
          organic: [],
          relatedSearches: [{ query: 'offshore wind' }],
          peopleAlsoAsk: [{ question: 'How much power does a turbine make?' }],
        })
      )
    )
    const provider = new SerperSearchProvider({ apiKey: 'test-key' })

    await expect(provider.getSearchMetadata('wind')).resolves.toEqual({
      relatedSearches: ['offshore wind'],
      peopleAlsoAsk: ['How much power does a turbine make?'],
      knowledgeGraph: undefined,
    })
  })
})

describe('SerpApiSearchProvider', () => {
  it('builds engine, paging and filter parameters', async () => {
    const fetchMock = vi
      .fn<(input: string) => Promise<Response>>()
      .mockResolvedValueOnce(
        jsonResponse({ organic_results: [{ link: 'https://a.example/x', title: 'A', snippet: 'first' }] })
      )
      .mockResolvedValueOnce(jsonResponse({ organic_results: [] }))
    vi.stubGlobal('fetch', fetchMock)
    const provider = new SerpApiSearchProvider({ apiKey: 'test-key' })

    const hits = await provider.search('flood', 5, {
      location: 'Copenhagen',
      locale: 'da',
      country: 'dk',
      device: 'mobile',
      safeSearch: true,
      dateFrom: new Date(Date.UTC(2024, 0, 5)),
      dateTo: new Date(Date.UTC(2024, 11, 31)),
    })

    expect(hits).toEqual([
      { url: 'https://a.example/x', title: 'A', description: 'first', rank: 1, domain: 'a.example' },
    ])
    const url = requestedUrl(fetchMock.mock.calls[0][0])
    expect(Object.fromEntries(url.searchParams)).toEqual({
      api_key: 'test-key',
      engine: 'google',
      q: 'flood',
      num: '5',
      start: '0',
      location: 'Copenhagen',
      hl: 'da',
      gl: 'dk',
      device: 'mobile',
      safe: 'active',
      tbs: 'cdr:1,cd_min:01/05/2024,cd_max:12/31/2024',
    })
  })

  it('caps results per engine', () => {
    const provider = new SerpApiSearchProvider({ apiKey: 'test-key', engine: 'bing' })

    expect(provider.resultCap({})).toBe(50)
    expect(provider.resultCap({ engine: 'duckduckgo' })).toBe(30)
  })

  it('accepts url in place of link and treats "no results" as an empty page', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(jsonResponse({ organic_results: [{ url: 'https://b.example/', title: 'B' }] }))
        .mockResolvedValueOnce(jsonResponse({ error: "Google hasn't returned any results for this query." }))
    )
    const provider = new SerpApiSearchProvider({ apiKey: 'test-key', engine: 'duckduckgo' })

    await expect(provider.search('q', 1)).resolves.toMatchObject([{ url: 'https://b.example/', rank: 1 }])
    await expect(provider.search('q', 10)).resolves.toEqual([])
  })

  it('returns suggestions and falls back to an empty list on failure', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ suggestions: [{ value: 'flood map' }, { value: 'flood risk' }] }))
      .mockResolvedValueOnce(jsonResponse({}, 500))
    vi.stubGlobal('fetch', fetchMock)
    const provider = new SerpApiSearchProvider({ apiKey: 'test-key' })

    await expect(provider.getSuggestions('flood')).resolves.toEqual(['flood map', 'flood risk'])
    await expect(provider.getSuggestions('flood')).resolves.toEqual([])
    expect(requestedUrl(fetchMock.mock.calls[0][0]).searchParams.get('engine')).toBe('google_autocomplete')
  })

  it('formats tbs dates as MM/DD/YYYY in UTC', () => {
    expect(formatTbsDate(new Date(Date.UTC(2023, 6, 4, 23, 30)))).toBe('07/04/2023')
  })
})
