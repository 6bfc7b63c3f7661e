import { MongoClient, type Collection, type BulkWriteOptions, type Document, type W } from 'mongodb';
import { logger } from '../../utils/logger.js';
import { SinkError } from '../../utils/errors.js';
import type { NormalizedBatch } from '../../types/telemetry.js';
import type { FamilyTargets } from '../../types/config.js';
import type { RecordSink } from '../pipeline/types.js';
import { OUTPUT_LISTS, recordsFor, type OutputList } from './types.js';

/**
 * Configuration options for the MongoDB record sink
 */
export interface MongoSinkOptions {
  uri: string;
  database: string;
  targets: FamilyTargets;
  batchSize?: number;
  writeConcern?: string;
  orderedInserts?: boolean;
}

/**
 * Running insert totals per output list
 */
export type InsertionMetrics = Record<OutputList, number> & { failedBatches: number };

/**
 * "majority" or a node count such as "1"
 */
export function parseWriteConcern(value: string): W {
  if (value === 'majority') return 'majority';
  const numeric = Number(value);
  if (value.trim() === '' || !Number.isInteger(numeric) || numeric < 0) {
    throw new SinkError(`Unsupported write concern: ${value}`);
  }
  return numeric;
}

/**
 * MongoDB record sink
 * Each output list goes to its own collection with chunked insertMany
 */
export class MongoRecordSink implements RecordSink {
  private client: MongoClient;
  private options: Required<MongoSinkOptions>;
  private collections: Partial<Record<OutputList, Collection>> = {};
  private metrics: InsertionMetrics = { node: 0, interface: 0, address: 0, failedBatches: 0 };

  constructor(options: MongoSinkOptions) {
    this.options = {
      batchSize: 1000,
      writeConcern: 'majority',
      orderedInserts: false,
      ...options
    };

    this.client = new MongoClient(this.options.uri, {
      writeConcern: { w: parseWriteConcern(this.options.writeConcern) },
      maxPoolSize: 20,
      minPoolSize: 1,
      serverSelectionTimeoutMS: 10000,
      socketTimeoutMS: 60000
    });
  }

  /**
   * Connect to MongoDB and resolve the target collections
   */
  async connect(): Promise<void> {
    try {
      await this.client.connect();
      const db = this.client.db(this.options.database);
      for (const list of OUTPUT_LISTS) {
        this.collections[list] = db.collection(this.options.targets[list]);
      }
      logger.info('Connected to MongoDB', {
        database: this.options.database,
        collections: this.options.targets
      });
    } catch (error) {
      logger.error('MongoDB connection failed', error);
      throw new SinkError(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
        { database: this.options.database },
        { cause: error }
      );
    }
  }

  async write(batch: NormalizedBatch): Promise<void> {
    const bulkOptions: BulkWriteOptions = {
      ordered: this.options.orderedInserts
    };

    for (const list of OUTPUT_LISTS) {
      const records = recordsFor(batch, list);
      // insertMany rejects an empty array, and an empty list has nothing to store
      if (records.length === 0) continue;

      const collection = this.collections[list];
      if (!collection) {
        throw new SinkError('Not connected to MongoDB. Call connect() first.', {
          batchId: batch.batchId
        });
      }

      for (let start = 0; start < records.length; start += this.options.batchSize) {
        // The driver assigns _id on the documents it is given; records stay untouched
        const chunk: Document[] = records
          .slice(start, start + this.options.batchSize)
          .map((record) => ({ ...record }));
        try {
          const result = await collection.insertMany(chunk, bulkOptions);
          this.metrics[list] += result.insertedCount;
        } catch (error) {
          this.metrics.failedBatches++;
          throw new SinkError(
            `Insert into ${this.options.targets[list]} failed: ${error instanceof Error ? error.message : String(error)}`,
            { batchId: batch.batchId, collection: this.options.targets[list] },
            { cause: error }
          );
        }
      }
    }
  }

  getMetrics(): InsertionMetrics {
    return { ...this.metrics };
  }

  /**
   * Close MongoDB connection
   */
  async close(): Promise<void> {
    await this.client.close();
    this.collections = {};
    logger.info('MongoDB connection closed', this.getMetrics());
  }
}

/**
 * Factory function for a connected MongoRecordSink
 */
export async function createMongoRecordSink(options: MongoSinkOptions): Promise<MongoRecordSink> {
  const sink = new MongoRecordSink(options);
  await sink.connect();
  return sink;
}
