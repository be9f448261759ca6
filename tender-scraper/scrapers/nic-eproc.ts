/**
 * NIC eProcurement (GePNIC) Scraper
 * State portals built on the NIC "nicgep" application, e.g. eproc.rajasthan.gov.in
 *
 * The portal is server-rendered: an organisation listing links to per-department
 * tender lists, and each tender has a detail page laid out as caption/value cells.
 */

import * as cheerio from 'cheerio'
import type { CheerioAPI } from 'cheerio'
import { BaseTenderScraper } from './base-scraper'
import type { PageSource } from '../utils/portal-session'
import type {
  DepartmentRow,
  PortalConfig,
  TenderDates,
  TenderDetailOutcome,
  TenderInspection,
} from '../types'

const DATE_LABELS: Record<keyof TenderDates, string> = {
  published_date: 'Published Date',
  sale_start_date: 'Document Download / Sale Start Date',
  clarification_start_date: 'Clarification Start Date',
  bid_submission_start_date: 'Bid Submission Start Date',
  bid_opening_date: 'Bid Opening Date',
  sale_end_date: 'Sale End Date',
  clarification_end_date: 'Clarification End Date',
  bid_submission_end_date: 'Bid Submission End Date',
}

const TENDER_VALUE_LABEL = 'Tender Value in ₹'
// Plain decimal notation only; Number() would also take 0x1F, 0b11, 0o7
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

// Listing page: the organisation table is the third list_table
const DEPARTMENT_TABLE_INDEX = 2
// Organisation page: "Title and Ref.No./Tender ID" column
const TENDER_LINK_COLUMN = 4

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Cells nest whole layout tables on these pages, so label lookups only
 * consider elements that hold no further cells.
 */
function leafCells($: CheerioAPI, selector: string) {
  return $(selector).filter((_, el) => $(el).find('td').length === 0)
}

export function parseDepartmentRows(html: string): DepartmentRow[] | null {
  const $ = cheerio.load(html)
  const tables = $('table.list_table')
  if (tables.length <= DEPARTMENT_TABLE_INDEX) {
    return null
  }

  const rows: DepartmentRow[] = []
  tables
    .eq(DEPARTMENT_TABLE_INDEX)
    .find('tr')
    .each((_, row) => {
      const cells = $(row).find('td')
      if (cells.length < 3) return
      const href = cells.eq(2).find('a').first().attr('href')?.trim()
      rows.push({ name: cleanText(cells.eq(1).text()), href: href || null })
    })

  return rows
}

export function parseTenderLinks(html: string): string[] {
  const $ = cheerio.load(html)
  const table = $('table.list_table').first()
  const hrefs: string[] = []

  table.find('tr').each((_, row) => {
    const cells = $(row).find('td')
    if (cells.length <= TENDER_LINK_COLUMN) return
    const href = cells.eq(TENDER_LINK_COLUMN).find('a').first().attr('href')?.trim()
    if (href) hrefs.push(href)
  })

  return hrefs
}

export function parseTenderDates($: CheerioAPI): TenderDates {
  const extractDate = (label: string): string | null => {
    const bold = $('b')
      .filter((_, el) => $(el).text().includes(label))
      .first()
    if (bold.length === 0) return null
    const valueCell = bold.closest('td').nextAll('td').first()
    return valueCell.length > 0 ? cleanText(valueCell.text()) || null : null
  }

  return {
    published_date: extractDate(DATE_LABELS.published_date),
    sale_start_date: extractDate(DATE_LABELS.sale_start_date),
    clarification_start_date: extractDate(DATE_LABELS.clarification_start_date),
    bid_submission_start_date: extractDate(DATE_LABELS.bid_submission_start_date),
    bid_opening_date: extractDate(DATE_LABELS.bid_opening_date),
    sale_end_date: extractDate(DATE_LABELS.sale_end_date),
    clarification_end_date: extractDate(DATE_LABELS.clarification_end_date),
    bid_submission_end_date: extractDate(DATE_LABELS.bid_submission_end_date),
  }
}

export function extractCaptionValue($: CheerioAPI, label: RegExp): string | null {
  const caption = leafCells($, 'td.td_caption')
    .filter((_, el) => label.test($(el).text()))
    .first()
  const valueCell = caption.nextAll('td').first()
  return valueCell.length > 0 ? cleanText(valueCell.text()) || null : null
}

/**
 * Organisation chain sits in the first row and the tender id in the third
 * row of the summary table, both as bold text in the second cell.
 */
export function parseTenderIdentity($: CheerioAPI): { tenderId: string | null; organisationChain: string | null } {
  const table = $('table.tablebg').first()
  const rows = table.find('tr')
  if (rows.length < 3) {
    return { tenderId: null, organisationChain: null }
  }

  const boldInSecondCell = (rowIndex: number): string | null => {
    const bold = rows.eq(rowIndex).find('td').eq(1).find('b').first()
    return bold.length > 0 ? cleanText(bold.text()) || null : null
  }

  const tenderId = boldInSecondCell(2)
  const organisationChain = boldInSecondCell(0)
  if (tenderId === null || organisationChain === null) {
    return { tenderId: null, organisationChain: null }
  }
  return { tenderId, organisationChain }
}

/**
 * Parse the rupee amount shown beside the tender value caption.
 * Returns null for "NA"/blank and undefined for text that is not a number.
 */
export function parseTenderValue(raw: string): number | null | undefined {
  const cleaned = raw.replace(/,/g, '').replace(/₹/g, '').trim()
  if (cleaned === '' || cleaned.toUpperCase() === 'NA') return null
  if (!DECIMAL_PATTERN.test(cleaned)) return undefined
  const value = Number(cleaned)
  return Number.isFinite(value) ? Math.trunc(value) : undefined
}

export function parseTenderDetail(html: string, valueCeiling: number): TenderDetailOutcome {
  const $ = cheerio.load(html)

  const valueLabel = leafCells($, 'td')
    .filter((_, el) => $(el).text().includes(TENDER_VALUE_LABEL))
    .first()
  if (valueLabel.length === 0) {
    return { kind: 'unparseable', reason: 'Tender value not found' }
  }

  const valueCell = valueLabel.nextAll('td').first()
  if (valueCell.length === 0) {
    return { kind: 'unparseable', reason: 'Tender value cell missing' }
  }

  const valueText = cleanText(valueCell.text())
  const tenderValue = parseTenderValue(valueText)
  if (tenderValue === undefined) {
    return { kind: 'unparseable', reason: `Could not convert tender value: ${valueText}` }
  }

  if (tenderValue !== null && tenderValue >= valueCeiling) {
    return { kind: 'over-ceiling', value: tenderValue }
  }

  const { tenderId, organisationChain } = parseTenderIdentity($)
  return {
    kind: 'accepted',
    detail: {
      tender_id: tenderId,
      tender_value: tenderValue,
      organisation_chain: organisationChain,
      tender_type: extractCaptionValue($, /Tender Type/i),
      tender_dates: parseTenderDates($),
    },
  }
}

export class NicEprocScraper extends BaseTenderScraper {
  constructor(
    config: PortalConfig,
    pages: PageSource,
    failedHtmlDir: string,
    private readonly valueCeiling: number
  ) {
    super(config, pages, failedHtmlDir)
  }

  async loadDepartments(): Promise<DepartmentRow[] | null> {
    const html = await this.fetchPage(`${this.config.baseUrl}${this.config.listingPath}`)
    if (html === null) {
      console.error(`[${this.name}] Listing page could not be fetched`)
      return null
    }

    const rows = parseDepartmentRows(html)
    if (rows === null) {
      console.error(`[${this.name}] Department table not found on listing page`)
      return null
    }

    console.log(`[${this.name}] Found department table (${rows.length} rows)`)
    return rows
  }

  async listTenderLinks(departmentUrl: string): Promise<string[] | null> {
    const html = await this.fetchPage(departmentUrl)
    if (html === null) return null

    const links = parseTenderLinks(html).map(href => this.absoluteUrl(href))
    console.log(`[${this.name}] Extracted ${links.length} tender links from organisation page`)
    return links
  }

  async inspectTender(tenderUrl: string): Promise<TenderInspection> {
    const html = await this.fetchPage(tenderUrl)
    if (html === null) {
      return { kind: 'fetch-failed' }
    }

    const outcome = parseTenderDetail(html, this.valueCeiling)
    switch (outcome.kind) {
      case 'unparseable':
        console.warn(`[${this.name}] ${outcome.reason} (${tenderUrl})`)
        this.keepFailedPage(html, tenderUrl)
        break
      case 'over-ceiling':
        console.log(`[${this.name}] Tender value ${outcome.value} >= ${this.valueCeiling}. Skipping.`)
        break
      case 'accepted':
        console.log(`[${this.name}] Extracted Tender ID: ${outcome.detail.tender_id ?? 'n/a'}`)
        break
    }
    return outcome
  }
}
