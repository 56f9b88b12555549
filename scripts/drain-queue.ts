import { Queue } from 'bullmq';
import { loadConfig } from '../src/config.js';
import { isJobForProject } from '../src/jobs/advance-job.js';
import { createRedisConnection } from '../src/queue.js';

/**
 * Drain or clear the pipeline queue.
 *
 * Usage:
 *   npm run drain-queue                          # Drain waiting jobs (leave active; default)
 *   npm run drain-queue -- --project <uuid>      # Remove the waiting steps of one project
 *   npm run drain-queue -- --obliterate          # Remove ALL jobs (waiting, active, completed, failed)
 */
async function main() {
  const args = process.argv.slice(2);
  const projectIdx = args.indexOf('--project');
  const projectUuid = projectIdx === -1 ? null : (args.at(projectIdx + 1) ?? '');
  if (projectUuid === '') {
    throw new Error('--project needs a project uuid');
  }

  const cfg = loadConfig();
  const connection = createRedisConnection(cfg.redisUrl);
  const queue = new Queue(cfg.queueName, { connection });

  try {
    if (args.includes('--obliterate')) {
      await queue.obliterate({ force: true });
      console.log(`Queue "${cfg.queueName}" obliterated (all jobs removed).`);
    } else if (projectUuid) {
      const waiting = await queue.getJobs(['waiting', 'delayed', 'prioritized']);
      const steps = waiting.filter((job) => isJobForProject(job.data, projectUuid));
      await Promise.all(steps.map((job) => job.remove()));
      console.log(`Removed ${steps.length} waiting step(s) of project ${projectUuid} from "${cfg.queueName}".`);
    } else {
      await queue.drain(true);
      console.log(`Queue "${cfg.queueName}" drained (waiting jobs removed).`);
    }
  } finally {
    await queue.close();
    await connection.quit();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
