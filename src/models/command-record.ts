/**
 * One executed shell invocation as stored in the command history
 */
export interface CommandRecord {
  id: number; // Store-assigned, strictly increasing
  command: string;
  working_directory: string;
  exit_code: number;
  duration_seconds: number;
  timestamp: number; // Epoch milliseconds
  session_id: string | null;
}

/**
 * Input accepted by CommandStore.log
 */
export interface NewCommand {
  command: string;
  cwd: string;
  exitCode: number;
  durationSeconds: number;
  /** Epoch milliseconds; the store assigns the current time when omitted */
  timestamp?: number;
  sessionId?: string | null;
}

/**
 * A distinct command text with its usage count
 */
export interface CommandFrequency {
  command: string;
  count: number;
  lastUsed: number;
  lastId: number; // Newest record carrying this text
}

/**
 * Aggregate figures over the whole history
 */
export interface StoreStatistics {
  totalCommands: number;
  uniqueCommands: number;
  successfulCommands: number;
  successRate: number; // 0-1
  totalSessions: number;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
  topCommands: CommandFrequency[];
  databaseSizeBytes: number;
}
