/**
 * One scrape run: walk the configured departments, collect tenders not seen
 * before, mail the digest, then remember what was mailed.
 */

import type { BaseTenderScraper } from './scrapers/base-scraper'
import type { DepartmentReport, ScrapeRunSummary, TenderResult } from './types'
import { findDepartment } from './utils/department-filter'
import { buildDigestHtml, DIGEST_SUBJECT } from './utils/digest'
import type { DigestMailer } from './utils/mailer'
import type { TenderStore } from './utils/mongo'

export interface RunnerDeps {
  scraper: BaseTenderScraper
  store: TenderStore
  mailer: DigestMailer
  departments: string[]
  portalKey: string
  now?: () => Date
}

export interface RunOutcome {
  summary: ScrapeRunSummary
  reports: DepartmentReport[]
  newTenders: TenderResult[]
}

async function scanDepartment(
  deps: RunnerDeps,
  department: string,
  departmentUrl: string | null,
  seen: Set<string>
): Promise<{ report: DepartmentReport; tenders: TenderResult[] }> {
  const { scraper, store } = deps
  const report: DepartmentReport = { department, status: 'not-found', totalTenders: 0, entries: [], newTenders: 0 }
  const tenders: TenderResult[] = []

  if (!departmentUrl) {
    console.warn(`[Runner] Department '${department}' not found in table.`)
    return { report, tenders }
  }

  const links = await scraper.listTenderLinks(departmentUrl)
  if (links === null) {
    report.status = 'fetch-failed'
    return { report, tenders }
  }

  report.status = 'scanned'
  report.totalTenders = links.length

  for (const tenderUrl of links) {
    console.log(`[Runner] Processing tender URL: ${tenderUrl}`)
    const inspection = await scraper.inspectTender(tenderUrl)

    if (inspection.kind === 'fetch-failed') {
      console.warn(`[Runner] Failed to fetch tender details for URL: ${tenderUrl}`)
      continue
    }
    if (inspection.kind === 'unparseable') {
      report.entries.push({ kind: 'failed', url: tenderUrl })
      continue
    }
    if (inspection.kind === 'over-ceiling') {
      continue
    }

    const tenderId = inspection.detail.tender_id
    if (!tenderId) {
      console.warn(`[Runner] Tender ID not extracted for URL: ${tenderUrl}`)
      continue
    }
    if (seen.has(tenderId)) {
      console.log(`[Runner] Tender ID ${tenderId} already listed in this run. Skipping.`)
      continue
    }
    seen.add(tenderId)

    if (await store.isProcessed(tenderId)) {
      console.log(`[Runner] Tender ID ${tenderId} already processed. Skipping.`)
      continue
    }

    const tender: TenderResult = {
      ...inspection.detail,
      tender_id: tenderId,
      source_url: tenderUrl,
      department,
      portal: deps.portalKey,
    }
    tenders.push(tender)
    report.entries.push({ kind: 'tender', tender })
    report.newTenders++
  }

  return { report, tenders }
}

export async function runTenderScraper(deps: RunnerDeps): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date())
  const startedAt = now().toISOString()
  const reports: DepartmentReport[] = []
  const newTenders: TenderResult[] = []

  const finish = async (extra: { success: boolean; notified: boolean; tendersStored: number; error?: string }) => {
    const summary: ScrapeRunSummary = {
      portal: deps.portalKey,
      startedAt,
      finishedAt: now().toISOString(),
      departments: reports.map(r => ({
        department: r.department,
        status: r.status,
        tendersFound: r.totalTenders,
        tendersNew: r.newTenders,
      })),
      tendersNew: newTenders.length,
      ...extra,
    }

    try {
      await deps.store.recordRun(summary)
    } catch (logError) {
      console.error('[Runner] Failed to record run:', logError instanceof Error ? logError.message : 'Unknown error')
    }
    return { summary, reports, newTenders }
  }

  const rows = await deps.scraper.loadDepartments()
  if (rows === null) {
    return finish({ success: false, notified: false, tendersStored: 0, error: 'Department listing unavailable' })
  }

  const seen = new Set<string>()
  for (const department of deps.departments) {
    console.log(`\n[Runner] Processing department: ${department}`)
    const row = findDepartment(rows, department)
    const departmentUrl = row ? deps.scraper.departmentUrl(row) : null

    const { report, tenders } = await scanDepartment(deps, department, departmentUrl, seen)
    reports.push(report)
    newTenders.push(...tenders)
    console.log(`[Runner] Found ${report.newTenders} new tenders for ${department}`)
  }

  console.log('[Runner] Email body constructed. Now sending email.')
  try {
    await deps.mailer.send(DIGEST_SUBJECT, buildDigestHtml(reports))
  } catch (mailError) {
    const errorMessage = mailError instanceof Error ? mailError.message : 'Unknown error'
    console.error(`[Runner] Error sending email: ${errorMessage}`)
    return finish({ success: false, notified: false, tendersStored: 0, error: `Email failed: ${errorMessage}` })
  }

  // Stored only once mailed, so an undelivered digest is reported again next run
  try {
    const stored = await deps.store.markProcessed(newTenders)
    return finish({ success: true, notified: true, tendersStored: stored })
  } catch (storeError) {
    const errorMessage = storeError instanceof Error ? storeError.message : 'Unknown error'
    return finish({ success: false, notified: true, tendersStored: 0, error: `Store failed: ${errorMessage}` })
  }
}
