export type {
  DriveLetter,
  DriveClass,
  DriveOutcome,
  RepairStep,
  RepairStepError,
  ScheduledTaskDescriptor,
  DriveResult,
  RunSummary,
} from './drive.js'
