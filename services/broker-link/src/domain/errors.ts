/**
 * ドメイン層: エラー分類
 *
 * 呼び出し側は kind でリトライ可否を判断する。
 */
export type BrokerErrorKind =
  | 'transient_network'
  | 'authentication'
  | 'capacity_exceeded'
  | 'malformed_message'
  | 'fatal_connection'
  | 'pool_unavailable'
  | 'session_unavailable';

export abstract class BrokerLinkError extends Error {
  abstract readonly kind: BrokerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 既知の一時的なネットワークエラー。固定間隔でリトライする。 */
export class TransientNetworkError extends BrokerLinkError {
  readonly kind = 'transient_network';

  constructor(
    message: string,
    readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** 認証失敗（ログイン応答が失敗）。上限まではリトライする。 */
export class AuthenticationError extends BrokerLinkError {
  readonly kind = 'authentication';
}

/** 購読枠が埋まっている。リトライしない。 */
export class CapacityExceededError extends BrokerLinkError {
  readonly kind = 'capacity_exceeded';

  constructor(
    readonly symbol: string,
    readonly capacity: number
  ) {
    super(`No subscription capacity left for ${symbol} (cap ${capacity} per slot)`);
  }
}

/** パースできない、または必須フィールドが欠けているメッセージ。 */
export class MalformedMessageError extends BrokerLinkError {
  readonly kind = 'malformed_message';

  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message);
  }
}

/** 一時的でない接続エラー。プロセスの生存フラグを即座に落とす。 */
export class FatalConnectionError extends BrokerLinkError {
  readonly kind = 'fatal_connection';
}

/** マーケットデータ接続プールを規定回数内に構築できなかった。 */
export class PoolUnavailableError extends BrokerLinkError {
  readonly kind = 'pool_unavailable';
}

/** 有効な取引セッションがない。 */
export class SessionUnavailableError extends BrokerLinkError {
  readonly kind = 'session_unavailable';
}

/**
 * ゲートウェイ接続時のエラー。code はゲートウェイまたは OS のエラーコード。
 */
export class GatewayConnectionError extends Error {
  constructor(
    message: string,
    readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayConnectionError';
  }
}

/**
 * 既知の一時的なネットワークエラーコード。
 * 11001 はゲートウェイのホスト解決失敗。
 */
export const DEFAULT_TRANSIENT_CODES: readonly string[] = [
  '11001',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
];

/**
 * エラーが既知の一時的なネットワークエラーかどうかを判定する。
 * @param error 捕捉したエラー
 * @param transientCodes 一時的とみなすコード一覧
 */
export function isTransientNetworkError(
  error: unknown,
  transientCodes: readonly string[] = DEFAULT_TRANSIENT_CODES
): boolean {
  if (error instanceof TransientNetworkError) {
    return true;
  }
  if (error instanceof GatewayConnectionError && error.code !== undefined) {
    return transientCodes.includes(error.code);
  }
  if (error instanceof Error) {
    return transientCodes.some((code) => error.message.includes(code));
  }
  return false;
}

/**
 * ゲートウェイ接続時のエラーを一時的か致命的かに分類する。元のエラーは cause に残す。
 */
export function classifyConnectionError(
  error: unknown,
  transientCodes: readonly string[] = DEFAULT_TRANSIENT_CODES
): TransientNetworkError | FatalConnectionError {
  const message = errorMessage(error);
  if (!isTransientNetworkError(error, transientCodes)) {
    return new FatalConnectionError(message, { cause: error });
  }
  const code = error instanceof GatewayConnectionError || error instanceof TransientNetworkError ? error.code : undefined;
  return new TransientNetworkError(message, code, { cause: error });
}

/**
 * ログ出力用にエラーからメッセージを取り出す。
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
