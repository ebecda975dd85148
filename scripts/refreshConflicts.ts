// Refresh the stored conflicts of one schedule and print them by priority
// Run with: npm run refresh-conflicts -- "<schedule name>" [--auto]

import dotenv from 'dotenv';
import dbConnect, { dbDisconnect } from '@/lib/dbConnect';
import { loadConflictSettings } from '@/lib/config';
import { createConflictEngine } from '@/lib/conflicts';
import { createMongoRepositories } from '@/lib/repositories/mongo';
import { Schedule, type ISchedule } from '@/models';
import type { ActingUser } from '@/types';

dotenv.config({ path: '.env.local' });

async function refreshConflicts() {
  const args = process.argv.slice(2);
  const autoResolve = args.includes('--auto');
  const scheduleName = args.find((arg) => !arg.startsWith('--'));

  if (!scheduleName) {
    console.error('❌ Usage: refreshConflicts.ts "<schedule name>" [--auto]');
    process.exitCode = 1;
    return;
  }

  try {
    await dbConnect();
    console.log('✅ Connected to MongoDB');

    const doc = await Schedule.findOne({ name: scheduleName }).lean<ISchedule>();
    if (!doc) {
      console.log(`ℹ️  No schedule named "${scheduleName}"`);
      process.exitCode = 1;
      return;
    }
    const schedule = { id: doc._id.toString(), name: doc.name };

    const engine = createConflictEngine(createMongoRepositories(), { settings: loadConflictSettings() });
    const conflicts = await engine.detection.refreshConflicts(schedule);

    console.log(`\n📋 ${conflicts.length} active conflict(s) in ${schedule.name}:`);
    for (const { conflict, score } of engine.priority.rankConflicts(conflicts)) {
      console.log(`   [${score.priorityLevel}] ${score.totalScore.toFixed(1)}  ${conflict.severity}  ${conflict.title}`);
    }

    if (autoResolve) {
      const user: ActingUser = {
        id: process.env.CONFLICT_OPERATOR_ID || 'script',
        username: process.env.CONFLICT_OPERATOR || 'conflict-script',
      };
      const resolved = await engine.resolution.autoResolveAll(schedule, user);
      console.log(`\n🤖 Auto-resolved ${resolved} conflict(s)`);

      if (resolved > 0) {
        const remaining = await engine.detection.refreshConflicts(schedule);
        console.log(`💾 ${remaining.length} conflict(s) remain after auto-resolution`);
      }
    }
  } catch (error) {
    console.error('❌ Error refreshing conflicts:', error);
    process.exitCode = 1;
  } finally {
    await dbDisconnect();
  }
}

void refreshConflicts();
