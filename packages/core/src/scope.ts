import type { ResultSet } from './result/resultSet.js'

/**
 * Run `fn` with a result set and release it on every exit path, whether
 * `fn` returns, throws, resolves or rejects.
 */
export function withResultSet<T>(resultSet: ResultSet, fn: (resultSet: ResultSet) => Promise<T>): Promise<T>
export function withResultSet<T>(resultSet: ResultSet, fn: (resultSet: ResultSet) => T): T
export function withResultSet<T>(
  resultSet: ResultSet,
  fn: (resultSet: ResultSet) => T | Promise<T>,
): T | Promise<T> {
  let result: T | Promise<T>
  try {
    result = fn(resultSet)
  } catch (err) {
    resultSet.release()
    throw err
  }
  if (result instanceof Promise) {
    return result.finally(() => resultSet.release())
  }
  resultSet.release()
  return result
}
