import * as fs from 'fs'
import * as path from 'path'

export function failedHtmlFilename(tenderUrl: string, now: Date = new Date()): string {
  const safeUrl = tenderUrl.replace(/[^a-zA-Z0-9]/g, '_')
  return `failed_${safeUrl}_${Math.floor(now.getTime() / 1000)}.txt`
}

/**
 * Keep a detail page the parser could not read, for inspection after the run.
 */
export function saveFailedHtml(directory: string, html: string, tenderUrl: string, now: Date = new Date()): string {
  if (!fs.existsSync(directory)) {
    fs.mkdirSync(directory, { recursive: true })
  }

  const filepath = path.join(directory, failedHtmlFilename(tenderUrl, now))
  fs.writeFileSync(filepath, html, 'utf8')
  console.log(`[FailedHtml] Saved unparsed tender page: ${filepath}`)
  return filepath
}
