import { MongoClient, type Collection, type Db } from "mongodb";
import type { DeadLetter, JobReport, JobReportRepository } from "../../ports/JobReportRepository";
import { type IndexPlan, mongoIndexes } from "./mongo.indexes";

/**
 * Mongo persistence for job outcomes. Reports are upserted by `jobKey`, so
 * re-running a chapter replaces its previous report; dead letters append.
 */
export class MongoJobReportRepository implements JobReportRepository {
  private client?: MongoClient;
  private db?: Db;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "chapter_downloader",
    private readonly collectionNames = { jobReports: "job_reports", deadLetters: "dead_letters" }
  ) {}

  private async getDb(): Promise<Db> {
    if (this.db) return this.db;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();
    const db = this.client.db(this.dbName);

    await this.ensureIndexes(db.collection(this.collectionNames.jobReports), mongoIndexes.jobReports);
    await this.ensureIndexes(db.collection(this.collectionNames.deadLetters), mongoIndexes.deadLetters);

    this.db = db;
    return db;
  }

  private async ensureIndexes(col: Collection, plan: IndexPlan): Promise<void> {
    for (const idx of plan) {
      await col.createIndex(idx.keys, idx.options);
    }
  }

  private async jobReports(): Promise<Collection<JobReport>> {
    return (await this.getDb()).collection<JobReport>(this.collectionNames.jobReports);
  }

  private async deadLetters(): Promise<Collection<DeadLetter>> {
    return (await this.getDb()).collection<DeadLetter>(this.collectionNames.deadLetters);
  }

  async recordJobReport(report: JobReport): Promise<void> {
    const col = await this.jobReports();
    await col.replaceOne({ jobKey: report.jobKey }, report, { upsert: true });
  }

  async recordDeadLetter(entry: DeadLetter): Promise<void> {
    const col = await this.deadLetters();
    await col.insertOne({ ...entry });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.db = undefined;
  }
}
