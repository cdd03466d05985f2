/**
 * @entry System 外部工具调用层
 *
 * - runTool(): 结构化参数调用外部命令（execa，无 shell）
 * - runPowerShell(): 固定脚本 + 环境变量传参
 * - assertElevated(): 管理员权限检查
 * - assertWindows(): 平台检查
 */

export {
  type ToolResult,
  type RunToolOptions,
  runTool,
  formatCommand,
  setDryRun,
  isDryRun,
} from './runTool.js'
export { runPowerShell, splitLines } from './powershell.js'
export { isElevated, assertElevated } from './privilege.js'
export { isWindows, assertWindows } from './platform.js'
