import type { AppConfig } from '@/infra/config/AppConfig';
import type { BrokerConnection } from '@/presentation/BrokerConnection';

/**
 * 起動処理の結果。not_alive は生存フラグ側の終了処理に任せる
 */
export type StartupResult = 'started' | 'not_alive';

/**
 * ログイン → 口座選択 → 購読 の順に起動する。
 * @throws {Error} ログインが拒否された場合、または口座が見つからない場合
 */
export async function startBrokerLink(
  connection: BrokerConnection,
  config: Pick<AppConfig, 'credentials' | 'accountNo' | 'symbols'>
): Promise<StartupResult> {
  const loggedIn = await connection.login(config.credentials);
  if (!connection.isAlive()) {
    return 'not_alive';
  }
  if (!loggedIn) {
    throw new Error('login failed');
  }
  if (!connection.setActiveAccount(config.accountNo)) {
    throw new Error(`account not found: ${config.accountNo}`);
  }

  for (const symbol of config.symbols) {
    connection.subscribe(symbol);
  }
  return 'started';
}
