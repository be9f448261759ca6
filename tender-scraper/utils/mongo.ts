/**
 * MongoDB store for tender deduplication and run history
 * Runs in GitHub Actions (or under the scheduler) with MONGO_URI bound
 */

import { MongoClient, type Collection } from 'mongodb'
import type { ScrapeRunSummary, TenderResult } from '../types'

export const TENDER_DB = 'tender_db'
export const TENDERS_COLLECTION = 'tenders'
export const RUNS_COLLECTION = 'scraper_runs'

export interface TenderStore {
  isProcessed(tenderId: string): Promise<boolean>
  /** Returns how many of the given tenders were not stored before */
  markProcessed(tenders: TenderResult[]): Promise<number>
  recordRun(summary: ScrapeRunSummary): Promise<void>
  close(): Promise<void>
}

export interface TenderDocument extends TenderResult {
  first_seen_at: Date
}

export interface ScraperRunDocument extends ScrapeRunSummary {
  recorded_at: Date
}

export type TenderCollection = Pick<Collection<TenderDocument>, 'findOne' | 'bulkWrite'>
export type RunCollection = Pick<Collection<ScraperRunDocument>, 'insertOne'>

export class MongoTenderStore implements TenderStore {
  private constructor(
    private readonly client: Pick<MongoClient, 'close'>,
    private readonly tenders: TenderCollection,
    private readonly runs: RunCollection
  ) {}

  /**
   * Wrap collections that are already set up (index included)
   */
  static fromCollections(
    client: Pick<MongoClient, 'close'>,
    tenders: TenderCollection,
    runs: RunCollection
  ): MongoTenderStore {
    return new MongoTenderStore(client, tenders, runs)
  }

  static async connect(uri: string, dbName: string = TENDER_DB): Promise<MongoTenderStore> {
    const client = new MongoClient(uri)
    try {
      await client.connect()
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error'
      throw new Error(`Failed to connect to MongoDB: ${errorMessage}`)
    }

    const db = client.db(dbName)
    const tenders = db.collection<TenderDocument>(TENDERS_COLLECTION)
    await tenders.createIndex({ tender_id: 1 }, { unique: true })
    console.log(`[Mongo] Connected to database: ${dbName}`)

    return MongoTenderStore.fromCollections(client, tenders, db.collection<ScraperRunDocument>(RUNS_COLLECTION))
  }

  async isProcessed(tenderId: string): Promise<boolean> {
    const existing = await this.tenders.findOne({ tender_id: tenderId }, { projection: { _id: 1 } })
    return existing !== null
  }

  async markProcessed(tenders: TenderResult[]): Promise<number> {
    if (tenders.length === 0) return 0

    const now = new Date()
    const result = await this.tenders.bulkWrite(
      tenders.map(tender => ({
        updateOne: {
          filter: { tender_id: tender.tender_id },
          update: { $setOnInsert: { ...tender, first_seen_at: now } },
          upsert: true,
        },
      })),
      { ordered: false }
    )

    const duplicates = tenders.length - result.upsertedCount
    console.log(`[Mongo] Inserted ${result.upsertedCount} new tenders (${duplicates} duplicates skipped)`)
    return result.upsertedCount
  }

  async recordRun(summary: ScrapeRunSummary): Promise<void> {
    await this.runs.insertOne({ ...summary, recorded_at: new Date() })
  }

  async close(): Promise<void> {
    await this.client.close()
  }
}
