/**
 * Tender Scraper Orchestrator
 *
 * Job entry point, started by the scheduler or the GitHub Actions workflow.
 * Scrapes the NIC eProcurement organisation listing for the configured
 * departments and mails a digest of tenders not reported before.
 *
 * Usage:
 *   DEPARTMENTS="Public Works Department" npx tsx tender-scraper/index.ts
 */

import * as path from 'path'
import { config } from 'dotenv'
import { loadScraperConfig } from './config'
import { runTenderScraper } from './runner'
import { NicEprocScraper } from './scrapers/nic-eproc'
import { PORTAL_CONFIGS } from './types'
import { SmtpDigestMailer } from './utils/mailer'
import { MongoTenderStore } from './utils/mongo'
import { PortalSession } from './utils/portal-session'

// Local runs read .env.local, then .env; bound variables always win
config({ path: path.join(__dirname, '..', '.env.local') })
config()

const PORTAL_KEY = 'rajasthan'

async function main() {
  console.log('='.repeat(60))
  console.log('Tender Scraper')
  console.log('='.repeat(60))
  console.log(`Started: ${new Date().toISOString()}`)
  console.log()

  const settings = loadScraperConfig(process.env)
  const portal = PORTAL_CONFIGS[PORTAL_KEY]

  console.log(`Portal: ${portal.name}`)
  console.log(`Departments to search: ${settings.departments.join(', ')}`)
  console.log()

  const store = await MongoTenderStore.connect(settings.mongoUri)
  let success = false

  try {
    const scraper = new NicEprocScraper(
      portal,
      new PortalSession(portal),
      settings.failedHtmlDir,
      settings.valueCeiling
    )
    const mailer = new SmtpDigestMailer({ from: settings.emailFrom, to: settings.emailTo, smtp: settings.smtp })

    const { summary } = await runTenderScraper({
      scraper,
      store,
      mailer,
      departments: settings.departments,
      portalKey: PORTAL_KEY,
    })
    success = summary.success

    // Print summary
    console.log('\n' + '='.repeat(60))
    console.log('SUMMARY')
    console.log('='.repeat(60))

    for (const department of summary.departments) {
      const status = department.status === 'scanned' ? '✓' : '✗'
      console.log(
        `${status} ${department.department}: ${department.tendersFound} found, ${department.tendersNew} new` +
          (department.status === 'scanned' ? '' : ` (${department.status})`)
      )
    }

    console.log()
    console.log(`New tenders: ${summary.tendersNew}`)
    console.log(`Stored: ${summary.tendersStored}`)
    console.log(`Digest sent: ${summary.notified ? 'yes' : 'no'}`)
    if (summary.error) {
      console.log(`Error: ${summary.error}`)
    }
    console.log(`Completed: ${summary.finishedAt}`)
    console.log('='.repeat(60))
  } finally {
    await store.close()
  }

  if (!success) {
    console.error('\nTender scraper run failed!')
    process.exit(1)
  }
}

main().catch(error => {
  console.error('Fatal error:', error)
  process.exit(1)
})
