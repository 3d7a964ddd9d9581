/**
 * 上限付きワーカープールでタスクを実行し、入力順に結果を返す。
 * いずれかが失敗したら新しいタスクの取り出しを止め、実行中のタスクが終わってから最初のエラーで reject する。
 */
export async function runWithConcurrencyLimit<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  maxConcurrent: number
): Promise<T[]> {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new Error(`maxConcurrent must be a positive integer: ${maxConcurrent}`)
  }

  const results = new Array<T>(tasks.length)
  let nextIndex = 0
  const errors: unknown[] = []

  const worker = async () => {
    while (errors.length === 0 && nextIndex < tasks.length) {
      const index = nextIndex++
      try {
        results[index] = await tasks[index]()
      } catch (error) {
        errors.push(error)
      }
    }
  }

  const workerCount = Math.min(maxConcurrent, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  if (errors.length > 0) {
    throw errors[0]
  }
  return results
}
