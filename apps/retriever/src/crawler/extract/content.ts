/**
 * Page content extraction (cheerio).
 *
 * Pulls the title, meta description, document language, visible text and
 * outbound links from fetched HTML. Links are taken from the whole document
 * (navigation included); text excludes scripts, styles and page chrome.
 */

import * as cheerio from 'cheerio'

type AnyNode = Parameters<typeof cheerio.contains>[0]

export interface ExtractedContent {
  title: string | null
  metaDescription: string | null
  language: string | null
  text: string
  wordCount: number
  links: string[]
}

const NON_CONTENT_SELECTOR = 'script, style, noscript, template, iframe, svg, nav, header, footer, aside, form'

const BLOCK_SELECTOR =
  'p, div, section, article, main, li, ul, ol, h1, h2, h3, h4, h5, h6, td, th, tr, table, blockquote, pre, br, hr, dd, dt'

const SKIPPED_LINK_PREFIXES = ['#', 'javascript:', 'mailto:', 'tel:', 'data:']

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

function firstText($: cheerio.CheerioAPI, selector: string): string | null {
  const value = $(selector).first().text().replace(/\s+/g, ' ').trim()
  return value || null
}

function firstAttr($: cheerio.CheerioAPI, selector: string, attr: string): string | null {
  const value = $(selector).first().attr(attr)?.trim()
  return value || null
}

/**
 * Title fallbacks: <title>, og:title, twitter:title, first <h1>.
 */
export function extractTitle($: cheerio.CheerioAPI): string | null {
  return (
    firstText($, 'title') ??
    firstAttr($, 'meta[property="og:title"]', 'content') ??
    firstAttr($, 'meta[name="twitter:title"]', 'content') ??
    firstText($, 'h1')
  )
}

/**
 * Primary language subtag from <html lang>, lowercased ("en-US" → "en").
 */
export function extractLanguage($: cheerio.CheerioAPI): string | null {
  const lang = firstAttr($, 'html', 'lang') ?? firstAttr($, 'meta[http-equiv="content-language" i]', 'content')
  if (!lang) return null
  const primary = lang.split(/[-_,;\s]/)[0]?.toLowerCase()
  return primary || null
}

/**
 * Absolute http(s) links with fragments removed, in document order,
 * without duplicates.
 */
export function extractLinks($: cheerio.CheerioAPI, baseUrl: string): string[] {
  const seen = new Set<string>()
  const links: string[] = []

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim()
    if (!href) return
    const lower = href.toLowerCase()
    if (SKIPPED_LINK_PREFIXES.some((prefix) => lower.startsWith(prefix))) return

    let resolved: URL
    try {
      resolved = new URL(href, baseUrl)
    } catch {
      return
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return

    resolved.hash = ''
    const link = resolved.toString()
    if (!seen.has(link)) {
      seen.add(link)
      links.push(link)
    }
  })

  return links
}

/**
 * Visible text with whitespace collapsed. Mutates the document.
 */
export function extractVisibleText($: cheerio.CheerioAPI): string {
  $(NON_CONTENT_SELECTOR).remove()
  // keep words in adjacent blocks apart
  $(BLOCK_SELECTOR).before(' ').after(' ')
  const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root()
  return root.text().replace(/\s+/g, ' ').trim()
}

export function countWords(text: string): number {
  return text ? text.split(' ').length : 0
}

export function extractContent(html: string, baseUrl: string): ExtractedContent {
  const $ = loadHtml(html)

  const title = extractTitle($)
  const metaDescription =
    firstAttr($, 'meta[name="description"]', 'content') ??
    firstAttr($, 'meta[property="og:description"]', 'content')
  const language = extractLanguage($)
  const links = extractLinks($, baseUrl)
  const text = extractVisibleText($)

  return {
    title,
    metaDescription,
    language,
    text,
    wordCount: countWords(text),
    links,
  }
}
