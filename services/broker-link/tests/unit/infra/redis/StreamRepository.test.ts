import { tick } from '@test/unit/helpers/ticks';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StreamRepository, TICK_STREAM } from '@/infra/redis/StreamRepository';

// ioredis をモック
const mockXadd = vi.fn<(...args: string[]) => Promise<string>>();
const mockQuit = vi.fn<() => Promise<string>>();

vi.mock('ioredis', () => {
  class MockRedis {
    xadd = mockXadd;
    quit = mockQuit;
  }

  return {
    default: MockRedis,
  };
});

/**
 * 単体テスト: StreamRepository
 *
 * - ティックの Stream への配信
 * - Redis エラー時のハンドリング
 * - close() の動作
 */
describe('StreamRepository', () => {
  let repository: StreamRepository;
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;

  beforeEach(() => {
    mockXadd.mockReset();
    mockQuit.mockReset();
    mockXadd.mockResolvedValue('1234567890-0');
    mockQuit.mockResolvedValue('OK');

    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    repository = new StreamRepository('redis://localhost:6379/0', loggerMock, metricsMock);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('publish()', () => {
    it('ティックを md:tick に配信する', async () => {
      const t = tick('2330', 1700000000123, { price: 580.5, size: 3 });

      await repository.publish(t);

      expect(TICK_STREAM).toBe('md:tick');
      expect(mockXadd).toHaveBeenCalledWith(
        'md:tick',
        '*',
        'symbol',
        '2330',
        'ts',
        '1700000000123',
        'data',
        JSON.stringify(t)
      );
    });

    it('データフィールドは JSON として元のティックに戻せる', async () => {
      const t = tick('2317', 42, { id: 'ch-3', volume: 1200 });

      await repository.publish(t);

      const dataString = mockXadd.mock.calls[0][7];
      expect(JSON.parse(dataString)).toEqual({
        symbol: '2317',
        time: 42,
        bid: 100,
        ask: 101,
        isContinuous: true,
        id: 'ch-3',
        volume: 1200,
      });
    });

    it('xadd がエラーを投げた場合、エラーを数えてから伝播する', async () => {
      mockXadd.mockRejectedValue(new Error('Redis connection failed'));

      await expect(repository.publish(tick('2330', 1))).rejects.toThrow('Redis connection failed');

      expect(metricsMock.incrementError).toHaveBeenCalledWith('publish_error');
    });

    it('複数のティックを順次配信できる', async () => {
      await repository.publish(tick('2330', 1));
      await repository.publish(tick('2330', 2));
      await repository.publish(tick('2454', 3));

      expect(mockXadd).toHaveBeenCalledTimes(3);
      expect(mockXadd.mock.calls.map((args) => args[3])).toEqual(['2330', '2330', '2454']);
    });
  });

  describe('close()', () => {
    it('close() を呼ぶと Redis 接続が閉じられる', async () => {
      await repository.close();

      expect(mockQuit).toHaveBeenCalledTimes(1);
      expect(loggerMock.info).toHaveBeenCalledWith('redis connection closed');
    });

    it('close() がエラーを投げた場合、エラーが伝播する', async () => {
      mockQuit.mockRejectedValue(new Error('Failed to close connection'));

      await expect(repository.close()).rejects.toThrow('Failed to close connection');
    });
  });
});
