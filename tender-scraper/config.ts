/**
 * Scraper configuration, read from the environment the scheduler (or the
 * hosted workflow) binds for the job.
 */

import { parseDepartments } from './utils/department-filter'

export interface SmtpSettings {
  host: string
  port: number
  user: string | null
  password: string | null
}

export interface ScraperSettings {
  mongoUri: string
  emailFrom: string
  emailTo: string
  smtp: SmtpSettings
  departments: string[]
  valueCeiling: number
  failedHtmlDir: string
}

const REQUIRED_VARIABLES = ['MONGO_URI', 'EMAIL_FROM', 'EMAIL_TO', 'DEPARTMENTS'] as const

const DEFAULT_SMTP_SERVER = 'smtp.gmail.com'
const DEFAULT_SMTP_PORT = 587
const DEFAULT_VALUE_CEILING = 3000000
const DEFAULT_FAILED_HTML_DIR = 'failed_tender_html'

function read(env: NodeJS.ProcessEnv, name: string): string {
  return (env[name] || '').trim()
}

function parsePositiveInteger(name: string, raw: string, fallback: number): number {
  if (!raw) return fallback
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) <= 0) {
    throw new Error(`Invalid ${name}: "${raw}" (expected a positive integer)`)
  }
  return parseInt(raw, 10)
}

export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperSettings {
  const departments = parseDepartments(env.DEPARTMENTS)
  const missing = REQUIRED_VARIABLES.filter(name =>
    name === 'DEPARTMENTS' ? departments.length === 0 : !read(env, name)
  )

  if (missing.length > 0) {
    console.error('Environment check:')
    for (const name of REQUIRED_VARIABLES) {
      console.error(`  ${name}:`, missing.includes(name) ? 'not set' : 'set')
    }
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`)
  }

  return {
    mongoUri: read(env, 'MONGO_URI'),
    emailFrom: read(env, 'EMAIL_FROM'),
    emailTo: read(env, 'EMAIL_TO'),
    smtp: {
      host: read(env, 'SMTP_SERVER') || DEFAULT_SMTP_SERVER,
      port: parsePositiveInteger('SMTP_PORT', read(env, 'SMTP_PORT'), DEFAULT_SMTP_PORT),
      user: read(env, 'SMTP_USER') || null,
      password: env.SMTP_PASSWORD || null,
    },
    departments,
    valueCeiling: parsePositiveInteger('TENDER_VALUE_CEILING', read(env, 'TENDER_VALUE_CEILING'), DEFAULT_VALUE_CEILING),
    failedHtmlDir: read(env, 'FAILED_HTML_DIR') || DEFAULT_FAILED_HTML_DIR,
  }
}
