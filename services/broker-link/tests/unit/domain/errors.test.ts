import { describe, expect, it } from 'vitest';
import {
  classifyConnectionError,
  FatalConnectionError,
  GatewayConnectionError,
  isTransientNetworkError,
  TransientNetworkError,
} from '@/domain/errors';

/**
 * 単体テスト: 接続エラーの分類
 */
describe('isTransientNetworkError', () => {
  it('既知のコードを持つ GatewayConnectionError は一時的', () => {
    expect(isTransientNetworkError(new GatewayConnectionError('host not found', '11001'))).toBe(true);
  });

  it('未知のコードは一時的でない', () => {
    expect(isTransientNetworkError(new GatewayConnectionError('certificate rejected', 'CERT_REJECTED'))).toBe(false);
  });

  it('コードがなくてもメッセージに既知のコードがあれば一時的', () => {
    expect(isTransientNetworkError(new Error('connect ECONNREFUSED 127.0.0.1:8080'))).toBe(true);
  });

  it('一時的とみなすコードは差し替えられる', () => {
    const error = new GatewayConnectionError('gateway busy', 'BUSY');

    expect(isTransientNetworkError(error, ['BUSY'])).toBe(true);
    expect(isTransientNetworkError(error)).toBe(false);
  });

  it('Error 以外の値は一時的でない', () => {
    expect(isTransientNetworkError('ECONNRESET')).toBe(false);
  });
});

describe('classifyConnectionError', () => {
  it('一時的なエラーはコードと元のエラーを引き継ぐ', () => {
    const cause = new GatewayConnectionError('connection reset', 'ECONNRESET');

    const failure = classifyConnectionError(cause);

    expect(failure).toBeInstanceOf(TransientNetworkError);
    expect(failure.kind).toBe('transient_network');
    expect(failure.message).toBe('connection reset');
    expect(failure.cause).toBe(cause);
    expect(failure instanceof TransientNetworkError && failure.code).toBe('ECONNRESET');
  });

  it('それ以外は FatalConnectionError になる', () => {
    const failure = classifyConnectionError(new Error('unexpected handshake'));

    expect(failure).toBeInstanceOf(FatalConnectionError);
    expect(failure.kind).toBe('fatal_connection');
    expect(failure.name).toBe('FatalConnectionError');
  });
});
