/**
 * @entry Repair 扫描与修复调度
 *
 * - scanDrive(): 只读 chkdsk
 * - scheduleRebootRepair(): 重启时修复（逐步校验，首个失败即短路）
 * - createIdleRepairTask(): 空闲时自删除计划任务
 * - repairDrive(): 按分类选择路径，含失败回退
 */

export { scanDrive } from './scanDrive.js'
export { scheduleRebootRepair, toStepError, CONFIRM_TOKEN } from './rebootRepair.js'
export {
  taskNameFor,
  buildTaskDescriptor,
  buildCreateTaskArgs,
  createIdleRepairTask,
  DEFAULT_TASK_PREFIX,
} from './idleTask.js'
export { repairDrive, type RepairOutcome } from './repairDrive.js'
