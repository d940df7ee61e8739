/**
 * Promise チェーンによる非同期排他制御
 *
 * runExclusive に渡したタスクは登録順に 1 つずつ実行される。
 * タスクが失敗してもロックは必ず解放される。
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * 排他区間でタスクを実行する。
   * @param task 実行するタスク
   * @returns タスクの戻り値
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      release();
    }
  }
}
