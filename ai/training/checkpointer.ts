import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Checkpointer, ParameterSnapshot } from '../types';
import { TrainingRuntimeError } from '../errors';

const manifestSchema = z.object({
  episode: z.number().int().min(0),
  version: z.number().int().min(0),
  savedAt: z.string(),
  tensors: z.array(z.object({
    name: z.string(),
    shape: z.array(z.number().int().min(0)),
    offset: z.number().int().min(0),
    length: z.number().int().min(0),
  })),
});

type SnapshotManifest = z.infer<typeof manifestSchema>;

export interface SnapshotInfo {
  episode: number;
  manifestPath: string;
  weightsPath: string;
}

const SNAPSHOT_PATTERN = /^model-(\d+)\.json$/;

/**
 * Parameter snapshots on disk, keyed by episode count. Only the most recent
 * maxToKeep snapshots are retained.
 */
export class FileCheckpointer implements Checkpointer {
  constructor(private modelDir: string, private maxToKeep: number) {}

  async saveSnapshot(snapshot: ParameterSnapshot, episodeCount: number): Promise<void> {
    const manifestPath = path.join(this.modelDir, `model-${episodeCount}.json`);
    const weightsPath = path.join(this.modelDir, `model-${episodeCount}.bin`);

    const manifest: SnapshotManifest = {
      episode: episodeCount,
      version: snapshot.version,
      savedAt: new Date().toISOString(),
      tensors: [],
    };
    const total = snapshot.tensors.reduce((sum, t) => sum + t.values.length, 0);
    const weights = new Float32Array(total);
    let offset = 0;
    for (const t of snapshot.tensors) {
      weights.set(t.values, offset);
      manifest.tensors.push({ name: t.name, shape: [...t.shape], offset, length: t.values.length });
      offset += t.values.length;
    }

    try {
      await fs.promises.mkdir(this.modelDir, { recursive: true });
      await fs.promises.writeFile(weightsPath, Buffer.from(weights.buffer, weights.byteOffset, weights.byteLength));
      await fs.promises.writeFile(manifestPath, JSON.stringify(manifest, null, 2));
    } catch (error) {
      throw new TrainingRuntimeError('CHECKPOINT_FAILURE', `Failed to save snapshot ${manifestPath}`, { episodeCount }, error);
    }

    console.log(`Saved model to ${manifestPath}`);
    await this.prune();
  }

  /**
   * Saved snapshots, oldest first
   */
  listSnapshots(): SnapshotInfo[] {
    if (!fs.existsSync(this.modelDir)) {
      return [];
    }
    return fs.readdirSync(this.modelDir)
      .map(file => file.match(SNAPSHOT_PATTERN))
      .filter((match): match is RegExpMatchArray => match !== null)
      .map(match => {
        const episode = parseInt(match[1], 10);
        return {
          episode,
          manifestPath: path.join(this.modelDir, `model-${episode}.json`),
          weightsPath: path.join(this.modelDir, `model-${episode}.bin`),
        };
      })
      .sort((a, b) => a.episode - b.episode);
  }

  /**
   * Most recent snapshot, or null when nothing has been saved yet
   */
  async loadLatest(): Promise<{ episodeCount: number; snapshot: ParameterSnapshot } | null> {
    const snapshots = this.listSnapshots();
    const latest = snapshots[snapshots.length - 1];
    if (!latest) {
      return null;
    }

    try {
      const manifest = manifestSchema.parse(JSON.parse(await fs.promises.readFile(latest.manifestPath, 'utf8')));
      const raw = await fs.promises.readFile(latest.weightsPath);
      const weights = new Float32Array(raw.buffer.slice(raw.byteOffset, raw.byteOffset + raw.byteLength));
      return {
        episodeCount: manifest.episode,
        snapshot: {
          version: manifest.version,
          tensors: manifest.tensors.map(t => ({
            name: t.name,
            shape: t.shape,
            values: weights.slice(t.offset, t.offset + t.length),
          })),
        },
      };
    } catch (error) {
      throw new TrainingRuntimeError('CHECKPOINT_FAILURE', `Failed to load snapshot ${latest.manifestPath}`, undefined, error);
    }
  }

  private async prune(): Promise<void> {
    const snapshots = this.listSnapshots();
    const stale = snapshots.slice(0, Math.max(0, snapshots.length - this.maxToKeep));
    for (const info of stale) {
      await fs.promises.rm(info.manifestPath, { force: true });
      await fs.promises.rm(info.weightsPath, { force: true });
    }
  }
}
