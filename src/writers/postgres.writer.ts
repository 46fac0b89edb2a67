import { PoolClient } from 'pg';
import { transaction } from '@/config/database';
import { DB_QUERY_LIMITS } from '@/config/downloadRules';
import { Bar, Observation, OrderedBatch } from '@/models';
import { WriteFailureError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { IStoreWriter, WriteResult } from './interfaces';

type PayloadValue = string | boolean | null;

const COLUMNS_PER_ROW = 8;

function barPayload(prefix: string, bar: Bar | null): Record<string, PayloadValue> {
  return {
    [`${prefix}open`]: bar ? bar.open.toFixed() : null,
    [`${prefix}high`]: bar ? bar.high.toFixed() : null,
    [`${prefix}low`]: bar ? bar.low.toFixed() : null,
    [`${prefix}close`]: bar ? bar.close.toFixed() : null,
  };
}

/**
 * JSON payload stored per row. Decimals are kept as strings (NUMERIC precision).
 */
export function observationPayload(observation: Observation): Record<string, PayloadValue> {
  switch (observation.kind) {
    case 'TradeBar':
      return { ...barPayload('', observation), volume: observation.volume.toFixed() };
    case 'QuoteBar':
      return {
        ...barPayload('bid_', observation.bid),
        last_bid_size: observation.lastBidSize.toFixed(),
        ...barPayload('ask_', observation.ask),
        last_ask_size: observation.lastAskSize.toFixed(),
      };
    case 'Tick':
      if (observation.tickType === 'Trade') {
        return {
          price: observation.price.toFixed(),
          quantity: observation.quantity.toFixed(),
          exchange: observation.exchange,
          conditions: observation.conditions,
          suspicious: observation.suspicious,
        };
      }
      return {
        bid_price: observation.bidPrice.toFixed(),
        bid_size: observation.bidSize.toFixed(),
        ask_price: observation.askPrice.toFixed(),
        ask_size: observation.askSize.toFixed(),
        exchange: observation.exchange,
        conditions: observation.conditions,
        suspicious: observation.suspicious,
      };
  }
}

/**
 * PostgreSQL store (STORE_TYPE=postgres)
 * Replaces the batch's time span for the series in one transaction.
 * Schema: database/market_observations.sql
 */
export class PostgresStoreWriter implements IStoreWriter {
  constructor(
    private readonly logger: ILogger,
    private readonly chunkSize: number = DB_QUERY_LIMITS.INSERT_CHUNK_SIZE
  ) {}

  async write(batch: OrderedBatch): Promise<WriteResult> {
    const { instrument, resolution, tickType, observations } = batch;
    const partition = `${instrument.securityType}/${instrument.market}/${resolution}/${instrument.ticker}/${tickType}`;
    const first = observations[0];
    const last = observations[observations.length - 1] ?? first;

    try {
      await transaction(async (client) => {
        const deleted = await client.query(
          `
          DELETE FROM market_observations
          WHERE security_type = $1
            AND market = $2
            AND ticker = $3
            AND resolution = $4
            AND tick_type = $5
            AND end_time BETWEEN $6 AND $7
          `,
          [
            instrument.securityType,
            instrument.market,
            instrument.ticker,
            resolution,
            tickType,
            first.endTime.toJSDate(),
            last.endTime.toJSDate(),
          ]
        );

        for (let offset = 0; offset < observations.length; offset += this.chunkSize) {
          await this.insertChunk(client, batch, observations.slice(offset, offset + this.chunkSize));
        }

        this.logger.debug(
          { partition, replaced: deleted.rowCount ?? 0, inserted: observations.length },
          'Series span replaced'
        );
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WriteFailureError(`Could not store ${partition}: ${message}`, error);
    }

    return { partitions: [partition], observationCount: observations.length };
  }

  private async insertChunk(
    client: PoolClient,
    batch: OrderedBatch,
    chunk: readonly Observation[]
  ): Promise<void> {
    const values: unknown[] = [];
    const tuples = chunk.map((observation, index) => {
      const base = index * COLUMNS_PER_ROW;
      values.push(
        batch.instrument.securityType,
        batch.instrument.market,
        batch.instrument.ticker,
        batch.resolution,
        batch.tickType,
        observation.time.toJSDate(),
        observation.endTime.toJSDate(),
        JSON.stringify(observationPayload(observation))
      );
      const placeholders = Array.from({ length: COLUMNS_PER_ROW }, (_, i) => `$${base + i + 1}`);
      return `(${placeholders.join(', ')})`;
    });

    await client.query(
      `
      INSERT INTO market_observations (
        security_type,
        market,
        ticker,
        resolution,
        tick_type,
        time,
        end_time,
        payload
      ) VALUES ${tuples.join(', ')}
      `,
      values
    );
  }
}
