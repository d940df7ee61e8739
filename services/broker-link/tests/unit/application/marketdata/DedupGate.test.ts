import { tick } from '@test/unit/helpers/ticks';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DedupGate } from '@/application/marketdata/DedupGate';
import type { MarketTick } from '@/domain/types';

/**
 * 単体テスト: DedupGate
 *
 * - 銘柄ごとに時刻が単調増加するティックだけを配信する
 * - 未購読の銘柄は配信しない
 * - ハンドラの失敗は他のティックに影響しない
 */
describe('DedupGate', () => {
  let gate: DedupGate;
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let delivered: MarketTick[];

  beforeEach(() => {
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    gate = new DedupGate(loggerMock, metricsMock);
    delivered = [];
    gate.setHandler((t) => {
      delivered.push(t);
    });
  });

  describe('offer()', () => {
    it('100, 100, 99, 101 の順に届いたら 100 と 101 だけを配信する', async () => {
      gate.open('2330');

      const results = [
        await gate.offer(tick('2330', 100)),
        await gate.offer(tick('2330', 100)),
        await gate.offer(tick('2330', 99)),
        await gate.offer(tick('2330', 101)),
      ];

      expect(results).toEqual([true, false, false, true]);
      expect(delivered.map((t) => t.time)).toEqual([100, 101]);
      expect(gate.lastSeen('2330')).toBe(101);
      expect(metricsMock.incrementDropped).toHaveBeenCalledTimes(2);
      expect(metricsMock.incrementDropped).toHaveBeenCalledWith('stale');
    });

    it('同時に届いたティックも到着順に判定される', async () => {
      gate.open('2330');

      const results = await Promise.all([
        gate.offer(tick('2330', 1)),
        gate.offer(tick('2330', 3)),
        gate.offer(tick('2330', 2)),
      ]);

      expect(results).toEqual([true, true, false]);
      expect(delivered.map((t) => t.time)).toEqual([1, 3]);
    });

    it('エントリがない銘柄のティックは配信しない', async () => {
      const result = await gate.offer(tick('2317', 100));

      expect(result).toBe(false);
      expect(delivered).toEqual([]);
      expect(metricsMock.incrementDropped).toHaveBeenCalledWith('not_subscribed');
    });

    it('銘柄ごとに独立して判定される', async () => {
      gate.open('2330');
      gate.open('2317');

      await gate.offer(tick('2330', 100));
      await gate.offer(tick('2317', 50));
      await gate.offer(tick('2330', 90));

      expect(delivered.map((t) => `${t.symbol}:${t.time}`)).toEqual(['2330:100', '2317:50']);
      expect(metricsMock.incrementDelivered).toHaveBeenCalledWith('2330');
      expect(metricsMock.incrementDelivered).toHaveBeenCalledWith('2317');
    });

    it('ハンドラが失敗してもログに記録して次のティックを配信する', async () => {
      gate.open('2330');
      const handler = vi.fn<(t: MarketTick) => void>().mockImplementationOnce(() => {
        throw new Error('strategy failed');
      });
      gate.setHandler(handler);

      const first = await gate.offer(tick('2330', 100));
      const second = await gate.offer(tick('2330', 101));

      expect(first).toBe(true);
      expect(second).toBe(true);
      expect(handler).toHaveBeenCalledTimes(2);
      expect(loggerMock.error).toHaveBeenCalledWith('tick handler failed', {
        symbol: '2330',
        time: 100,
        error: 'strategy failed',
      });
    });

    it('待機中に購読解除されたティックは配信しない', async () => {
      gate.open('2330');
      let release: () => void = () => {};
      gate.setHandler((t) => {
        delivered.push(t);
        if (t.time === 100) {
          return new Promise<void>((resolve) => {
            release = resolve;
          });
        }
      });

      const first = gate.offer(tick('2330', 100));
      const second = gate.offer(tick('2330', 101));
      await Promise.resolve();
      gate.close('2330');
      release();

      expect(await first).toBe(true);
      expect(await second).toBe(false);
      expect(delivered.map((t) => t.time)).toEqual([100]);
      expect(metricsMock.incrementDropped).toHaveBeenCalledWith('not_subscribed');
    });
  });

  describe('open() / close()', () => {
    it('open() を 2 回呼んでも最終時刻は保たれる', async () => {
      gate.open('2330');
      await gate.offer(tick('2330', 100));

      gate.open('2330');

      expect(gate.lastSeen('2330')).toBe(100);
      expect(await gate.offer(tick('2330', 100))).toBe(false);
    });

    it('close() 後はエントリがなくなる', () => {
      gate.open('2330');
      gate.close('2330');

      expect(gate.isOpen('2330')).toBe(false);
      expect(gate.lastSeen('2330')).toBeNull();
    });
  });
});
