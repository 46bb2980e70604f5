export interface EpisodeStatsSnapshot {
  totalSteps: number;
  totalEpisodes: number;
  maxScore: number;
  runningAvgScore: number;
}

/**
 * Process-wide training progress, shared by every worker.
 * Each field is updated on its own; fields are not guaranteed to describe the
 * same episode when read together.
 */
export class EpisodeStats {
  private maxScore = 0;
  private runningAvgScore = 0;
  private stepsByWorker: number[];
  private episodesByWorker: number[];

  constructor(workerCount: number) {
    this.stepsByWorker = new Array<number>(workerCount).fill(0);
    this.episodesByWorker = new Array<number>(workerCount).fill(0);
  }

  /**
   * Fold one finished episode into the shared counters
   */
  recordEpisode(workerIndex: number, reward: number, workerSteps: number, workerEpisodes: number): void {
    this.stepsByWorker[workerIndex] = workerSteps;
    this.episodesByWorker[workerIndex] = workerEpisodes;

    if (reward > this.maxScore) {
      this.maxScore = reward;
    }

    const total = this.totalEpisodes;
    this.runningAvgScore += (reward - this.runningAvgScore) / (total > 0 ? total : 1);
  }

  get totalSteps(): number {
    return this.stepsByWorker.reduce((a, b) => a + b, 0);
  }

  get totalEpisodes(): number {
    return this.episodesByWorker.reduce((a, b) => a + b, 0);
  }

  snapshot(): EpisodeStatsSnapshot {
    return {
      totalSteps: this.totalSteps,
      totalEpisodes: this.totalEpisodes,
      maxScore: this.maxScore,
      runningAvgScore: this.runningAvgScore,
    };
  }
}
