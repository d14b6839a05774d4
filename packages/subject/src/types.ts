export interface LogConfig {
  enabled: boolean;
  /** Empty means every id not denied is logged. */
  allowedIds: Set<string>;
  deniedIds: Set<string>;
}

export interface SubjectConfig {
  logging: LogConfig;
}

export interface SubjectConfigOverrides {
  logging?: Partial<LogConfig>;
}

export type LogData = Record<string, unknown> | string;
