/**
 * Storage Types
 */

/**
 * `w` truncates a previous run's output, `a` continues it
 */
export type SinkMode = 'w' | 'a';

export interface RecordWriter<T> {
  readonly filePath: string;
  write(record: T): Promise<void>;
  close(): Promise<void>;
}
