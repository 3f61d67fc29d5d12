import { describe, it, expect } from 'vitest'
import { LinkFilter } from '../link-filter.js'

describe('LinkFilter', () => {
  describe('same_domain', () => {
    const filter = new LinkFilter({ domainPolicy: 'same_domain' })

    it('treats www and the bare host as one domain', () => {
      expect(filter.evaluate('https://ex.com/about', 'https://www.ex.com/')).toEqual({ admissible: true })
    })

    it('rejects other hosts, subdomains included', () => {
      expect(filter.evaluate('https://blog.ex.com/', 'https://ex.com/')).toEqual({
        admissible: false,
        reason: 'outside_domain',
      })
      expect(filter.isAdmissible('https://other.example/', 'https://ex.com/')).toBe(false)
    })
  })

  it('excludes listed domains and their subdomains', () => {
    const filter = new LinkFilter({
      domainPolicy: 'allow_all',
      excludedDomains: ['https://ads.example/', 'tracker.io'],
    })

    expect(filter.evaluate('https://cdn.tracker.io/x', 'https://ex.com/')).toEqual({
      admissible: false,
      reason: 'excluded_domain',
    })
    expect(filter.isAdmissible('https://ads.example/z', 'https://ex.com/')).toBe(false)
    expect(filter.isAdmissible('https://news.example/', 'https://ex.com/')).toBe(true)
  })

  it('admits only allowed TLDs under allow_tld_list', () => {
    const filter = new LinkFilter({ domainPolicy: 'allow_tld_list', allowedTlds: ['dk', '.EU'] })

    expect(filter.isAdmissible('https://shop.dk/', 'https://ex.com/')).toBe(true)
    expect(filter.isAdmissible('https://europa.eu/x', 'https://ex.com/')).toBe(true)
    expect(filter.evaluate('https://example.com/', 'https://ex.com/')).toEqual({
      admissible: false,
      reason: 'tld_not_allowed',
    })
  })

  it('rejects document and media extensions', () => {
    const filter = new LinkFilter({ domainPolicy: 'same_domain' })

    expect(filter.evaluate('https://ex.com/report.PDF', 'https://ex.com/')).toEqual({
      admissible: false,
      reason: 'excluded_extension',
    })
    expect(filter.isAdmissible('https://ex.com/v1.2/page', 'https://ex.com/')).toBe(true)
    expect(filter.isAdmissible('https://ex.com/.hidden', 'https://ex.com/')).toBe(true)
  })

  it('rejects non-http URLs', () => {
    const filter = new LinkFilter({ domainPolicy: 'allow_all' })
    expect(filter.evaluate('ftp://ex.com/', 'https://ex.com/')).toEqual({ admissible: false, reason: 'invalid_url' })
  })
})
