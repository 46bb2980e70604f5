import * as fs from 'fs';
import * as path from 'path';
import type { Telemetry } from '../types';

export interface SummaryEntry {
  episode: number;
  metrics: Record<string, number>;
  timestamp: string;
}

/**
 * Per-worker summary writer for training metrics
 */
export class TelemetryRecorder implements Telemetry {
  private logFile: string;
  private entries: SummaryEntry[] = [];

  constructor(private workerName: string, logDir: string = './ai/logs') {
    const workerDir = path.join(logDir, workerName);
    if (!fs.existsSync(workerDir)) {
      fs.mkdirSync(workerDir, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(workerDir, `summary_${timestamp}.json`);

    console.log(`[${workerName}] Logging to: ${this.logFile}`);
  }

  /**
   * Append a summary for the given episode count
   */
  recordSummary(metrics: Record<string, number>, episodeCount: number): void {
    const entry: SummaryEntry = {
      episode: episodeCount,
      metrics: { ...metrics },
      timestamp: new Date().toISOString(),
    };

    this.entries.push(entry);

    fs.writeFileSync(this.logFile, JSON.stringify(this.entries, null, 2));

    console.log(`\n--- ${this.workerName} Episode ${episodeCount} ---`);
    for (const [tag, value] of Object.entries(metrics)) {
      console.log(`${tag}: ${value.toFixed(4)}`);
    }
    console.log('------------------------\n');
  }

  getLogFile(): string {
    return this.logFile;
  }

  getEntries(): SummaryEntry[] {
    return this.entries;
  }
}
