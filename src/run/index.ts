/**
 * @entry Run 单次检查流程
 */

export {
  runRepairPass,
  processDrive,
  type RunReport,
  type RepairPassOptions,
} from './runRepairPass.js'
export { summarize, requiresRestart } from './summarize.js'
