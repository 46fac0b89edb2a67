import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import Decimal from 'decimal.js';
import { LeanDiskWriter } from '@/writers/leanDisk.writer';
import { OrderedBatch } from '@/models';
import { WriteFailureError } from '@/errors';
import { buildInstrument, buildTradeBar, createMockLogger } from '@/tests/utils/mockCapabilities';

describe('LeanDiskWriter', () => {
  let dataFolder: string;
  let writer: LeanDiskWriter;

  const minuteFolder = () => path.join(dataFolder, 'equity', 'usa', 'minute', 'aapl');

  beforeEach(async () => {
    dataFolder = await mkdtemp(path.join(os.tmpdir(), 'lean-disk-'));
    writer = new LeanDiskWriter(dataFolder, createMockLogger());
  });

  afterEach(async () => {
    await rm(dataFolder, { recursive: true, force: true });
  });

  it('should write one file per UTC day', async () => {
    const batch: OrderedBatch = {
      instrument: buildInstrument(),
      resolution: 'Minute',
      tickType: 'Trade',
      observations: [
        buildTradeBar('2024-01-02T14:30:00Z'),
        buildTradeBar('2024-01-02T14:31:00Z'),
        buildTradeBar('2024-01-03T14:30:00Z'),
      ],
    };

    const result = await writer.write(batch);

    const first = path.join(minuteFolder(), '20240102_trade.csv');
    const second = path.join(minuteFolder(), '20240103_trade.csv');
    expect(result).toEqual({ partitions: [first, second], observationCount: 3 });
    expect(await readFile(first, 'utf8')).toBe(
      '52200000,1851000,1855000,1849000,1852000,12000\n' +
        '52260000,1851000,1855000,1849000,1852000,12000\n'
    );
    expect(await readFile(second, 'utf8')).toBe('52200000,1851000,1855000,1849000,1852000,12000\n');
  });

  it('should replace an existing partition and leave no temporary files', async () => {
    const batch = (close: string): OrderedBatch => ({
      instrument: buildInstrument(),
      resolution: 'Minute',
      tickType: 'Trade',
      observations: [buildTradeBar('2024-01-02T14:30:00Z', { close: new Decimal(close) })],
    });

    await writer.write(batch('185.2'));
    await writer.write(batch('186'));

    expect(await readdir(minuteFolder())).toEqual(['20240102_trade.csv']);
    expect(await readFile(path.join(minuteFolder(), '20240102_trade.csv'), 'utf8')).toBe(
      '52200000,1851000,1855000,1849000,1860000,12000\n'
    );
  });

  it('should write daily data into one file per ticker', async () => {
    const result = await writer.write({
      instrument: buildInstrument(),
      resolution: 'Daily',
      tickType: 'Trade',
      observations: [
        buildTradeBar('2024-01-02T00:00:00Z'),
        buildTradeBar('2024-01-03T00:00:00Z'),
      ],
    });

    const file = path.join(dataFolder, 'equity', 'usa', 'daily', 'aapl_trade.csv');
    expect(result.partitions).toEqual([file]);
    expect(await readFile(file, 'utf8')).toBe(
      '20240102 00:00,1851000,1855000,1849000,1852000,12000\n' +
        '20240103 00:00,1851000,1855000,1849000,1852000,12000\n'
    );
  });

  it('should raise WriteFailureError when the store cannot be written', async () => {
    const blocker = path.join(dataFolder, 'blocker');
    await writeFile(blocker, 'not a folder');
    const blocked = new LeanDiskWriter(blocker, createMockLogger());

    await expect(
      blocked.write({
        instrument: buildInstrument(),
        resolution: 'Minute',
        tickType: 'Trade',
        observations: [buildTradeBar('2024-01-02T14:30:00Z')],
      })
    ).rejects.toThrow(WriteFailureError);
  });
});
