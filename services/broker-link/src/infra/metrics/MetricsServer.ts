import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { errorMessage } from '@/domain/errors';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics で Prometheus 形式のメトリクスを、/healthz で生存フラグを公開
 */
export class MetricsServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger,
    private readonly isAlive: () => boolean = () => true
  ) {}

  /**
   * HTTP サーバーを起動
   */
  start(): void {
    if (this.server) {
      return;
    }
    this.server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
      if (req.url === '/metrics' && req.method === 'GET') {
        try {
          const metrics = await this.metricsCollector.getMetrics();
          const registry = this.metricsCollector.getRegistry();
          res.setHeader('Content-Type', registry.contentType);
          res.statusCode = 200;
          res.end(metrics);
        } catch (error) {
          this.logger.error('Failed to get metrics', { error: errorMessage(error) });
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      } else if (req.url === '/healthz' && req.method === 'GET') {
        // 生存フラグが落ちていれば 503 を返し、外部の監視から再起動できるようにする
        const alive = this.isAlive();
        res.statusCode = alive ? 200 : 503;
        res.end(alive ? 'ok' : 'not alive');
      } else {
        res.statusCode = 404;
        res.end('Not Found');
      }
    });

    this.server.listen(this.port, () => {
      this.logger.info('Metrics server started', { port: this.port });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
