import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import * as cheerio from 'cheerio'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  cleanText,
  NicEprocScraper,
  parseDepartmentRows,
  parseTenderDates,
  parseTenderDetail,
  parseTenderIdentity,
  parseTenderLinks,
  parseTenderValue,
} from '../scrapers/nic-eproc'
import { readFixture, StaticPages, TEST_PORTAL, tenderPage } from './helpers/pages'

const CEILING = 3000000

describe('cleanText', () => {
  it('collapses runs of whitespace and trims', () => {
    expect(cleanText('  Public  Works\n   Department ')).toBe('Public Works Department')
  })
})

describe('parseDepartmentRows', () => {
  it('reads name and link from the organisation table', () => {
    expect(parseDepartmentRows(readFixture('listing.html'))).toEqual([
      {
        name: 'Public Works Department',
        href: '/nicgep/app?component=%24DirectLink&page=FrontEndTendersByOrganisation&sp=PWD',
      },
      {
        name: 'Public Works Department (Roads)',
        href: '/nicgep/app?component=%24DirectLink&page=FrontEndTendersByOrganisation&sp=PWDR',
      },
      { name: 'Medical Education', href: null },
      {
        name: 'Water Resources Department',
        href: 'https://eproc.rajasthan.gov.in/nicgep/app?page=FrontEndTendersByOrganisation&sp=WRD',
      },
    ])
  })

  it('returns null when the page has fewer than three list tables', () => {
    const html = '<table class="list_table"><tr><td>a</td></tr></table><table class="list_table"></table>'
    expect(parseDepartmentRows(html)).toBeNull()
  })
})

describe('parseTenderLinks', () => {
  it('takes the link in the title column of each tender row', () => {
    expect(parseTenderLinks(readFixture('org-page.html'))).toEqual([
      '/nicgep/app?component=%24DirectLink&page=FrontEndViewTender&sp=T100001',
      '/nicgep/app?component=%24DirectLink&page=FrontEndViewTender&sp=T100002',
    ])
  })

  it('returns nothing for a page without a list table', () => {
    expect(parseTenderLinks('<html><body><p>No tenders</p></body></html>')).toEqual([])
  })
})

describe('parseTenderValue', () => {
  it('strips grouping commas and the rupee sign', () => {
    expect(parseTenderValue('9,50,000')).toBe(950000)
    expect(parseTenderValue('₹ 1,234.56')).toBe(1234)
  })

  it('treats NA and blank as no value', () => {
    expect(parseTenderValue('NA')).toBeNull()
    expect(parseTenderValue('  ')).toBeNull()
  })

  it('returns undefined for text that is not a number', () => {
    expect(parseTenderValue('To be decided')).toBeUndefined()
  })

  it('rejects hex, binary and octal notation', () => {
    expect(parseTenderValue('0x1F')).toBeUndefined()
    expect(parseTenderValue('0b101')).toBeUndefined()
    expect(parseTenderValue('0o17')).toBeUndefined()
    expect(parseTenderValue('1.5e6')).toBe(1500000)
  })
})

describe('parseTenderIdentity', () => {
  it('reads organisation chain and tender id from the summary table', () => {
    const $ = cheerio.load(readFixture('tender-detail.html'))
    expect(parseTenderIdentity($)).toEqual({
      tenderId: '2026_PWD_100001_1',
      organisationChain: 'Public Works Department||Circle Jaipur||Division I',
    })
  })

  it('gives up on both fields when either is missing', () => {
    const $ = cheerio.load(
      '<table class="tablebg">' +
        '<tr><td>Organisation Chain</td><td><b>PWD</b></td></tr>' +
        '<tr><td>Ref</td><td><b>R1</b></td></tr>' +
        '<tr><td>Tender ID</td><td>plain text</td></tr>' +
        '</table>'
    )
    expect(parseTenderIdentity($)).toEqual({ tenderId: null, organisationChain: null })
  })
})

describe('parseTenderDates', () => {
  it('reads the cell after each bold caption and leaves empty cells null', () => {
    const $ = cheerio.load(readFixture('tender-detail.html'))
    expect(parseTenderDates($)).toEqual({
      published_date: '02-Mar-2026 10:00 AM',
      sale_start_date: '02-Mar-2026 10:30 AM',
      clarification_start_date: null,
      bid_submission_start_date: '02-Mar-2026 11:00 AM',
      bid_opening_date: '20-Mar-2026 11:00 AM',
      sale_end_date: '18-Mar-2026 06:00 PM',
      clarification_end_date: null,
      bid_submission_end_date: '18-Mar-2026 06:00 PM',
    })
  })
})

describe('parseTenderDetail', () => {
  it('accepts a tender below the ceiling', () => {
    const outcome = parseTenderDetail(readFixture('tender-detail.html'), CEILING)

    expect(outcome.kind).toBe('accepted')
    if (outcome.kind !== 'accepted') return
    expect(outcome.detail.tender_id).toBe('2026_PWD_100001_1')
    expect(outcome.detail.tender_value).toBe(950000)
    expect(outcome.detail.tender_type).toBe('Open Tender')
    expect(outcome.detail.organisation_chain).toBe('Public Works Department||Circle Jaipur||Division I')
    expect(outcome.detail.tender_dates.bid_submission_end_date).toBe('18-Mar-2026 06:00 PM')
  })

  it('rejects a tender whose value reaches the ceiling', () => {
    const html = readFixture('tender-detail.html').replace('9,50,000', '30,00,000')
    expect(parseTenderDetail(html, CEILING)).toEqual({ kind: 'over-ceiling', value: 3000000 })
  })

  it('accepts a tender with no stated value', () => {
    const outcome = parseTenderDetail(tenderPage({ id: 'T-NA', value: 'NA' }), CEILING)
    expect(outcome.kind).toBe('accepted')
    if (outcome.kind !== 'accepted') return
    expect(outcome.detail.tender_value).toBeNull()
  })

  it('reports a page without the value caption as unparseable', () => {
    expect(parseTenderDetail('<html><body><p>Maintenance</p></body></html>', CEILING)).toEqual({
      kind: 'unparseable',
      reason: 'Tender value not found',
    })
  })

  it('reports a value that is not a number as unparseable', () => {
    expect(parseTenderDetail(tenderPage({ id: 'T-X', value: 'Refer BOQ' }), CEILING)).toEqual({
      kind: 'unparseable',
      reason: 'Could not convert tender value: Refer BOQ',
    })
  })
})

describe('NicEprocScraper', () => {
  let failedDir: string

  beforeEach(() => {
    failedDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nic-eproc-'))
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    fs.rmSync(failedDir, { recursive: true, force: true })
  })

  it('loads departments from the listing page', async () => {
    const pages = new StaticPages({ 'https://eproc.test/listing': readFixture('listing.html') })
    const scraper = new NicEprocScraper(TEST_PORTAL, pages, failedDir, CEILING)

    const rows = await scraper.loadDepartments()

    expect(rows?.map(row => row.name)).toEqual([
      'Public Works Department',
      'Public Works Department (Roads)',
      'Medical Education',
      'Water Resources Department',
    ])
  })

  it('returns null when the listing cannot be fetched', async () => {
    const scraper = new NicEprocScraper(TEST_PORTAL, new StaticPages({}), failedDir, CEILING)
    expect(await scraper.loadDepartments()).toBeNull()
  })

  it('resolves department and tender links against the portal', async () => {
    const pages = new StaticPages({ 'https://eproc.test/org/pwd': readFixture('org-page.html') })
    const scraper = new NicEprocScraper(TEST_PORTAL, pages, failedDir, CEILING)

    expect(scraper.departmentUrl({ name: 'Public Works Department', href: '/org/pwd' })).toBe(
      'https://eproc.test/org/pwd'
    )
    expect(scraper.departmentUrl({ name: 'Medical Education', href: null })).toBeNull()
    expect(await scraper.listTenderLinks('https://eproc.test/org/pwd')).toEqual([
      'https://eproc.test/nicgep/app?component=%24DirectLink&page=FrontEndViewTender&sp=T100001',
      'https://eproc.test/nicgep/app?component=%24DirectLink&page=FrontEndViewTender&sp=T100002',
    ])
  })

  it('keeps an unparseable tender page on disk', async () => {
    const url = 'https://eproc.test/tender/5'
    const pages = new StaticPages({ [url]: '<html><body>Maintenance</body></html>' })
    const scraper = new NicEprocScraper(TEST_PORTAL, pages, failedDir, CEILING)

    const inspection = await scraper.inspectTender(url)

    expect(inspection).toEqual({ kind: 'unparseable', reason: 'Tender value not found' })
    const saved = fs.readdirSync(failedDir)
    expect(saved).toHaveLength(1)
    expect(saved[0]).toMatch(/^failed_https___eproc_test_tender_5_\d+\.txt$/)
    expect(fs.readFileSync(path.join(failedDir, saved[0]), 'utf8')).toBe('<html><body>Maintenance</body></html>')
  })

  it('reports a tender page that cannot be fetched', async () => {
    const scraper = new NicEprocScraper(TEST_PORTAL, new StaticPages({}), failedDir, CEILING)
    expect(await scraper.inspectTender('https://eproc.test/tender/6')).toEqual({ kind: 'fetch-failed' })
  })
})
