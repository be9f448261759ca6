/**
 * HTML digest of one scrape run, one section per configured department
 */

import { TENDER_DATE_KEYS } from '../types'
import type { DepartmentReport, DigestEntry, TenderResult } from '../types'

export const DIGEST_SUBJECT = 'Tender List'

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/**
 * "bid_submission_end_date" -> "Bid Submission End Date"
 */
export function formatDateLabel(key: string): string {
  return key
    .split('_')
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

function renderTender(tender: TenderResult): string {
  const url = escapeHtml(tender.source_url)
  const dates = TENDER_DATE_KEYS.map(key => {
    const value = tender.tender_dates[key]
    return value ? `${formatDateLabel(key)}: ${escapeHtml(value)}<br>` : ''
  }).join('')

  return (
    `<p><a href="${url}">Tender URL</a><br>` +
    `Tender ID: ${escapeHtml(tender.tender_id)}<br>` +
    `Tender Value in ₹: ${tender.tender_value ?? 'NA'}<br>` +
    `Tender Type: ${escapeHtml(tender.tender_type ?? 'NA')}<br>` +
    `Organization Chain: ${escapeHtml(tender.organisation_chain ?? 'NA')}<br>` +
    `<b>Critical Dates:</b><br>` +
    dates +
    `</p><hr>`
  )
}

function renderEntry(entry: DigestEntry): string {
  switch (entry.kind) {
    case 'tender':
      return renderTender(entry.tender)
    case 'failed': {
      const url = escapeHtml(entry.url)
      return `<p>Failed to fetch tender details for <a href="${url}">${url}</a></p>`
    }
  }
}

export function renderDepartment(report: DepartmentReport): string {
  const department = escapeHtml(report.department)
  let html = `<h2>Department: ${department}</h2>`

  switch (report.status) {
    case 'not-found':
      return html + '<p>Not found or no link available.</p>'
    case 'fetch-failed':
      return html + '<p>Failed to fetch organisation page.</p>'
    case 'scanned':
      html += `<p>Found ${report.totalTenders} total tenders.</p>`
      html += report.entries.map(renderEntry).join('')
      return html + `Found ${report.newTenders} new tenders for ${department}<br>`
  }
}

export function buildDigestHtml(reports: DepartmentReport[]): string {
  return `<html><body>${reports.map(renderDepartment).join('')}</body></html>`
}
