export interface TimeRecord {
  date: string;
  issueId: number;
  hours: number;
  activityName: string;
  line: number;  // 1-based CSV line, header included
}

export interface RemoteTimeEntry {
  id: number;
  projectId: number;
  userId: number;
  spentOn: string;
  hours: number;
  activityId: number;
}

export interface NewTimeEntry {
  projectId: number;
  issueId: number;
  userId: number;
  spentOn: string;
  hours: number;
  activityId: number;
}

export type ActivityMap = Map<string, number>;  // activity name -> activity id

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
