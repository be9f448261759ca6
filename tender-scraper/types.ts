/**
 * Tender Scraper Types
 */

export interface TenderDates {
  published_date: string | null
  sale_start_date: string | null
  clarification_start_date: string | null
  bid_submission_start_date: string | null
  bid_opening_date: string | null
  sale_end_date: string | null
  clarification_end_date: string | null
  bid_submission_end_date: string | null
}

export const TENDER_DATE_KEYS = [
  'published_date',
  'sale_start_date',
  'clarification_start_date',
  'bid_submission_start_date',
  'bid_opening_date',
  'sale_end_date',
  'clarification_end_date',
  'bid_submission_end_date',
] as const satisfies ReadonlyArray<keyof TenderDates>

export interface TenderDetail {
  tender_id: string | null
  tender_value: number | null
  organisation_chain: string | null
  tender_type: string | null
  tender_dates: TenderDates
}

export interface TenderResult extends TenderDetail {
  tender_id: string
  source_url: string
  department: string
  portal: string
}

export type TenderDetailOutcome =
  | { kind: 'accepted'; detail: TenderDetail }
  | { kind: 'over-ceiling'; value: number }
  | { kind: 'unparseable'; reason: string }

export type TenderInspection =
  | TenderDetailOutcome
  | { kind: 'fetch-failed' }

export interface DepartmentRow {
  name: string
  href: string | null
}

export type DigestEntry =
  | { kind: 'tender'; tender: TenderResult }
  | { kind: 'failed'; url: string }

export type DepartmentStatus = 'not-found' | 'fetch-failed' | 'scanned'

export interface DepartmentReport {
  department: string
  status: DepartmentStatus
  totalTenders: number
  entries: DigestEntry[]
  newTenders: number
}

export interface ScrapeRunSummary {
  portal: string
  success: boolean
  startedAt: string
  finishedAt: string
  departments: Array<{
    department: string
    status: DepartmentStatus
    tendersFound: number
    tendersNew: number
  }>
  tendersNew: number
  tendersStored: number
  notified: boolean
  error?: string
}

export interface PortalConfig {
  name: string
  baseUrl: string
  listingPath: string
  restartPath: string
  userAgent: string
  timeout: number
}

export const PORTAL_CONFIGS: Record<string, PortalConfig> = {
  rajasthan: {
    name: 'Rajasthan eProcurement',
    baseUrl: 'https://eproc.rajasthan.gov.in',
    listingPath: '/nicgep/app?page=FrontEndTendersByOrganisation&service=page',
    restartPath: '/nicgep/app?service=restart',
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/15.0 Safari/605.1.15',
    timeout: 30000,
  },
}
