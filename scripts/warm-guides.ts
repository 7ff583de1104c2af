#!/usr/bin/env tsx
/**
 * Pre-generate AI guides for a player's locked achievements in one game
 *
 * Usage:
 *   npm run warm-guides -- --steam-id=76561198000000000 --app-id=730 [--max=5]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env.local for local development
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { initializeDatabase } from '../src/lib/db/index';
import { getSteamClient } from '../src/lib/steam/client';
import { getGuideServices } from '../src/lib/services';
import { warmAiGuides } from '../src/lib/pipeline/batch';
import { logger } from '../src/lib/logger';

function readArg(args: string[], name: string): string | undefined {
  return args.find((arg) => arg.startsWith(`--${name}=`))?.split('=')[1];
}

async function main() {
  const args = process.argv.slice(2);
  const steamId = readArg(args, 'steam-id');
  const appId = Number(readArg(args, 'app-id'));
  const maxCount = Number(readArg(args, 'max') ?? 5);

  if (!steamId || !Number.isInteger(appId) || appId <= 0) {
    console.error('Error: --steam-id and --app-id are required');
    process.exit(1);
  }
  if (!Number.isInteger(maxCount) || maxCount < 1 || maxCount > 50) {
    console.error('Error: --max must be between 1 and 50');
    process.exit(1);
  }

  await initializeDatabase();

  const data = await getSteamClient().getAchievementsForGame(steamId, appId);
  const locked = data.achievements.filter((a) => !a.achieved);
  console.log(`\n${data.gameName}: ${locked.length} locked achievements, warming up to ${maxCount}\n`);

  const { aiAdapter, aiGuides } = getGuideServices();
  const result = await warmAiGuides(aiAdapter, aiGuides, { appId, name: data.gameName }, locked, maxCount);

  console.log(`Generated: ${result.generated}`);
  console.log(`Skipped (already stored): ${result.skipped}`);
  console.log(`Failed: ${result.failed}`);
  if (result.stoppedBy) {
    console.log(`Stopped early: ${result.stoppedBy}`);
  }
}

main().catch((error) => {
  logger.error('Warm-up failed', error);
  process.exit(1);
});
