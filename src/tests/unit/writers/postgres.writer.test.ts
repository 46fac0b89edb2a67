import { PostgresStoreWriter, observationPayload } from '@/writers/postgres.writer';
import { OrderedBatch } from '@/models';
import { WriteFailureError } from '@/errors';
import {
  buildInstrument,
  buildQuoteTick,
  buildTradeBar,
  createMockLogger,
} from '@/tests/utils/mockCapabilities';

// Run the transaction callback directly against a mock client
const mockClient = {
  query: jest.fn(),
};

jest.mock('@/config/database', () => ({
  transaction: jest.fn((callback: (client: typeof mockClient) => Promise<unknown>) =>
    callback(mockClient)
  ),
}));

describe('PostgresStoreWriter', () => {
  const batch: OrderedBatch = {
    instrument: buildInstrument(),
    resolution: 'Minute',
    tickType: 'Trade',
    observations: [
      buildTradeBar('2024-01-02T14:30:00Z'),
      buildTradeBar('2024-01-02T14:31:00Z'),
      buildTradeBar('2024-01-02T14:32:00Z'),
    ],
  };

  beforeEach(() => {
    mockClient.query.mockReset();
    mockClient.query.mockResolvedValue({ rowCount: 0, rows: [] });
  });

  it('should replace the batch span and insert in chunks', async () => {
    const writer = new PostgresStoreWriter(createMockLogger(), 2);

    const result = await writer.write(batch);

    expect(result).toEqual({
      partitions: ['Equity/usa/Minute/AAPL/Trade'],
      observationCount: 3,
    });
    expect(mockClient.query).toHaveBeenCalledTimes(3);

    const [deleteSql, deleteParams] = mockClient.query.mock.calls[0];
    expect(deleteSql).toContain('DELETE FROM market_observations');
    expect(deleteParams).toEqual([
      'Equity',
      'usa',
      'AAPL',
      'Minute',
      'Trade',
      new Date('2024-01-02T14:31:00Z'),
      new Date('2024-01-02T14:33:00Z'),
    ]);

    const [firstInsert, firstValues] = mockClient.query.mock.calls[1];
    expect(firstInsert).toContain(
      'VALUES ($1, $2, $3, $4, $5, $6, $7, $8), ($9, $10, $11, $12, $13, $14, $15, $16)'
    );
    expect(firstValues).toHaveLength(16);
    expect(firstValues.slice(0, 7)).toEqual([
      'Equity',
      'usa',
      'AAPL',
      'Minute',
      'Trade',
      new Date('2024-01-02T14:30:00Z'),
      new Date('2024-01-02T14:31:00Z'),
    ]);
    expect(JSON.parse(firstValues[7])).toEqual({
      open: '185.1',
      high: '185.5',
      low: '184.9',
      close: '185.2',
      volume: '12000',
    });

    const [, secondValues] = mockClient.query.mock.calls[2];
    expect(secondValues).toHaveLength(8);
  });

  it('should wrap database errors in WriteFailureError', async () => {
    mockClient.query.mockRejectedValue(new Error('connection reset'));
    const writer = new PostgresStoreWriter(createMockLogger());

    const write = writer.write(batch);

    await expect(write).rejects.toThrow(WriteFailureError);
    await expect(write).rejects.toThrow(
      'Could not store Equity/usa/Minute/AAPL/Trade: connection reset'
    );
  });

  describe('observationPayload', () => {
    it('should keep quote tick fields as strings', () => {
      expect(observationPayload(buildQuoteTick('2024-01-02T14:30:00Z'))).toEqual({
        bid_price: '185.1',
        bid_size: '300',
        ask_price: '185.12',
        ask_size: '200',
        exchange: '11',
        conditions: '',
        suspicious: false,
      });
    });
  });
});
