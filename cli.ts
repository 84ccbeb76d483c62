import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { buildServices } from './wiring';

// One-shot runner for hosts that schedule syncs with their own cron:
//   npm run sync -- full | npm run sync -- share
const USAGE = 'Usage: npm run sync -- <full|share>';

async function main(kind: string | undefined): Promise<number> {
  if (kind !== 'full' && kind !== 'share') {
    console.error(USAGE);
    return 2;
  }

  const config = loadConfig(process.env);
  const logger = createLogger(config.log);
  const { jobs, history } = await buildServices(config, logger);

  logger.info(`--- Starting ${kind} sync ---`);
  const report = kind === 'full' ? await jobs.runFull() : await jobs.runShare();
  await history?.close();

  if (!report) {
    logger.error(`--- ${kind} sync aborted: ${jobs.status(kind).error ?? 'unknown error'} ---`);
    return 1;
  }
  const { generated, skipped, failed, removed } = report.counts;
  logger.info(`--- ${kind} sync complete: generated ${generated}, skipped ${skipped}, failed ${failed}, removed ${removed} ---`);
  return report.errors.length > 0 ? 1 : 0;
}

main(process.argv[2])
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exit(1);
  });
