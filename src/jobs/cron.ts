import cron, { type ScheduledTask } from 'node-cron';
import { config } from '../config/env';
import { reportProcessingService } from '../services/ReportProcessingService';

export async function runArtifactSweep() {
  const { removedFiles, prunedTasks } = await reportProcessingService.sweepExpiredArtifacts();
  if (removedFiles.length > 0 || prunedTasks.length > 0) {
    console.log(`[Cron] Artifact sweep removed ${removedFiles.length} file(s), pruned ${prunedTasks.length} task(s)`);
  }
}

export function initCronJobs() {
  console.log('[Cron] Initializing cron jobs...');

  // Mutex guard to prevent overlapping runs
  let isSweepRunning = false;

  const schedules: ScheduledTask[] = [];

  schedules.push(
    cron.schedule(config.ARTIFACT_CLEANUP_CRON, async () => {
      if (isSweepRunning) return; // Skip if previous run still active
      isSweepRunning = true;
      try {
        await runArtifactSweep();
      } catch (err) {
        console.error('[Cron] Artifact sweep failed', err);
      } finally {
        isSweepRunning = false;
      }
    })
  );

  console.log(`[Cron] Artifact sweep scheduled (${config.ARTIFACT_CLEANUP_CRON}).`);

  return {
    stop: () => {
      for (const task of schedules) {
        task.stop();
      }
    },
  };
}
