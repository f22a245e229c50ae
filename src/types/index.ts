/**
 * TimeLedger - Type Definitions
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Time entry with its project name joined in
export interface TimeEntry {
  id: number;
  projectId: number;
  project: string;
  task: string;
  notes: string | null;
  start: string; // local-naive yyyy-MM-ddTHH:mm:ss
  end: string | null; // null while running
  duration: number | null; // whole seconds, null while running
}

// Fields written by an edit
export interface EntryUpdate {
  projectName: string;
  task: string;
  notes: string;
  start: string;
  end: string | null;
}

// Date range filter for queries and summaries
export interface EntryRange {
  from: Date | string; // YYYY-MM-DD or Date, inclusive
  to: Date | string; // inclusive
  project?: string | undefined; // exact project name
}

export type GroupBy = 'project' | 'date';

export interface SummaryGroup {
  key: string;
  total_seconds: number;
  total_formatted: string;
  entry_count: number;
}

export interface SummaryResult {
  from: string;
  to: string;
  group_by: GroupBy;
  groups: SummaryGroup[];
  grand_total_seconds: number;
  grand_total_formatted: string;
  total_entries: number;
}

// Snapshot the presentation layer polls
export interface SessionStatus {
  running: TimeEntry | null;
  elapsedSeconds: number;
  todaySeconds: number;
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// Configuration
export interface FileConfig {
  version: number;
  storage: {
    db_path?: string | undefined;
  };
  export: {
    directory?: string | undefined;
  };
  settings: {
    log_level: LogLevel;
  };
}

export interface TimeLedgerConfig {
  dbPath: string;
  exportDir: string;
  logLevel: LogLevel;
}
