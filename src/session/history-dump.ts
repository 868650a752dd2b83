import { atomicWrite } from '../utils/atomic-write.js';
import type { Turn } from '../agent/chat-types.js';

/**
 * Sink for conversation history snapshots
 */
export interface HistorySink {
  write(history: readonly Turn[]): Promise<void>;
}

/**
 * HistoryDump - Writes the whole conversation to a JSON file after each turn
 *
 * Debug aid only: the file is overwritten each time and never read back.
 */
export class HistoryDump implements HistorySink {
  constructor(private readonly path: string) {}

  get filePath(): string {
    return this.path;
  }

  async write(history: readonly Turn[]): Promise<void> {
    const snapshot = {
      updatedAt: new Date().toISOString(),
      turns: history.length,
      history,
    };
    await atomicWrite(this.path, JSON.stringify(snapshot, null, 2) + '\n');
  }
}
