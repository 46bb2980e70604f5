#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { loadEnvFiles, loadTrainingConfig, parseRace } from './config/env';
import { FileCheckpointer } from './training/checkpointer';

/**
 * List the saved parameter snapshots for a race, newest first
 *
 * Usage: npm run snapshots -- [T|P|Z]
 */
function main(): number {
  loadEnvFiles();
  const config = loadTrainingConfig();
  const race = process.argv[2] !== undefined ? parseRace(process.argv[2]) : config.agent.race;
  const modelDir = path.join(config.checkpoints.saveDir, `model${race}`);

  console.log('=================================================');
  console.log(`     Saved Snapshots (race ${race})`);
  console.log('=================================================\n');

  const snapshots = new FileCheckpointer(modelDir, config.checkpoints.maxToKeep).listSnapshots().reverse();
  if (snapshots.length === 0) {
    console.log('No snapshots found');
    console.log(`   Expected: ${modelDir}`);
    console.log('   Train a model first with: npm run train -- <mapName>');
    return 1;
  }

  console.log(`Found ${snapshots.length} snapshots:\n`);
  snapshots.forEach((snapshot, idx) => {
    const size = fs.statSync(snapshot.weightsPath).size;
    console.log(`${idx + 1}. Episode ${snapshot.episode.toString().padEnd(8)} (${formatBytes(size)})`);
    console.log(`   ${snapshot.manifestPath}`);
  });

  console.log('\nResume from the latest snapshot with:\n');
  console.log('   npm run train -- <mapName> --load\n');
  return 0;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

process.exit(main());
