/**
 * Result 类型 - 统一处理成功/失败结果
 * 可恢复的失败（计划任务创建失败、通知失败）走 Result，不抛异常
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

// 构造函数
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * 依次执行全部异步步骤，某一步失败不影响后续步骤
 * 返回所有失败，按发生顺序排列；全部成功时为空数组
 */
export async function collectFailures<E>(
  steps: ReadonlyArray<() => Promise<Result<unknown, E>>>
): Promise<E[]> {
  const failures: E[] = []
  for (const step of steps) {
    const result = await step()
    if (!result.ok) failures.push(result.error)
  }
  return failures
}
