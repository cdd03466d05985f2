/**
 * CLI Spinner 封装
 * chkdsk 扫描单个盘符可能持续数分钟，扫描期间显示 spinner
 */

import ora from 'ora'

export interface Spinner {
  start(text?: string): void
  /** 停止并保留一行带自定义图标的结果 */
  persist(symbol: string, text: string): void
  fail(text?: string): void
}

export interface SpinnerOptions {
  text?: string
  /** false 时不绘制动画帧，每次 start 只输出一行，避免与调试日志交错 */
  enabled?: boolean
}

export function createSpinner(options: SpinnerOptions = {}): Spinner {
  const spinner = ora({
    text: options.text,
    spinner: 'dots',
    isEnabled: options.enabled,
  })

  return {
    start(newText?: string) {
      if (newText) spinner.text = newText
      spinner.start()
    },
    persist(symbol: string, newText: string) {
      spinner.stopAndPersist({ symbol, text: newText })
    },
    fail(newText?: string) {
      if (spinner.isSpinning) spinner.fail(newText)
    },
  }
}
