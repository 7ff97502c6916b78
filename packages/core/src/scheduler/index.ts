export type {
  ChapterJob,
  ChapterOutcome,
  ChapterReportEntry,
  ChapterRunner,
  ChapterSchedulerOptions,
  ScheduleRunOptions,
  SchedulerReport,
} from "./scheduler.js";
export { ChapterScheduler, planChapters } from "./scheduler.js";
