/**
 * Base Tender Scraper
 * Abstract class that all portal scrapers extend
 */

import type { PortalConfig, TenderInspection, DepartmentRow } from '../types'
import type { PageSource } from '../utils/portal-session'
import { saveFailedHtml } from '../utils/failed-html'

export abstract class BaseTenderScraper {
  constructor(
    readonly config: PortalConfig,
    protected readonly pages: PageSource,
    protected readonly failedHtmlDir: string
  ) {}

  get name(): string {
    return this.config.name
  }

  /**
   * Organisation rows from the portal's listing page, or null when the page
   * cannot be fetched or does not carry the expected table
   */
  abstract loadDepartments(): Promise<DepartmentRow[] | null>

  /**
   * Absolute tender detail URLs listed for one organisation, or null when the
   * organisation page could not be fetched
   */
  abstract listTenderLinks(departmentUrl: string): Promise<string[] | null>

  /**
   * Fetch and classify one tender detail page
   */
  abstract inspectTender(tenderUrl: string): Promise<TenderInspection>

  departmentUrl(row: DepartmentRow): string | null {
    if (!row.href) return null
    const url = this.absoluteUrl(row.href)
    console.log(`[${this.name}] Found department '${row.name}' link: ${url}`)
    return url
  }

  /**
   * Resolve a portal-relative link
   */
  protected absoluteUrl(href: string): string {
    const trimmed = href.trim()
    return trimmed.startsWith('http') ? trimmed : `${this.config.baseUrl}${trimmed}`
  }

  protected async fetchPage(url: string): Promise<string | null> {
    const html = await this.pages.fetchPage(url)
    if (html !== null) {
      console.log(`[${this.name}] Successfully fetched URL: ${url}`)
    }
    return html
  }

  /**
   * Keep the raw page on disk when parsing fails
   */
  protected keepFailedPage(html: string, url: string): string | null {
    try {
      return saveFailedHtml(this.failedHtmlDir, html, url)
    } catch (error) {
      console.error(`[${this.name}] Failed to save unparsed page:`, error)
      return null
    }
  }
}
