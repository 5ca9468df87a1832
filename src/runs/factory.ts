/**
 * Builds a RunOrchestrator wired to the real collaborators
 */

import { createYtDlpRunner, YTDLP_TIMEOUTS } from '../channels/ytdlp.js';
import { YtDlpLister } from '../channels/lister.js';
import { YtDlpProbe } from '../channels/prober.js';
import { YtDlpAudioCollector } from '../media/collector.js';
import { createHistoryStore } from '../history/index.js';
import { createS3Client, S3Bucket } from '../storage/bucket.js';
import { BucketOverflowUploader } from '../delivery/overflow.js';
import { SmtpMailer } from '../delivery/mailer.js';
import { MailDeliverySink } from '../delivery/sink.js';
import { RunOrchestrator } from './orchestrator.js';
import type { S3Client } from '@aws-sdk/client-s3';
import type { EnvConfig } from '../config/env.js';
import type { HistoryStore } from '../history/types.js';

/**
 * One S3 client shared by the history backend and the overflow uploader,
 * created only when one of them is configured
 */
function bucketOpener(config: EnvConfig): (name: string) => S3Bucket {
  let client: S3Client | undefined;
  return (name: string) => {
    client ??= createS3Client({
      region: config.S3_REGION,
      endpoint: config.S3_ENDPOINT,
      forcePathStyle: config.S3_FORCE_PATH_STYLE,
    });
    return new S3Bucket(client, name);
  };
}

export interface RunComponents {
  orchestrator: RunOrchestrator;
  store: HistoryStore;
}

export function createRunComponents(config: EnvConfig): RunComponents {
  const openBucket = bucketOpener(config);
  const store = createHistoryStore(config, openBucket);

  const overflow = config.OVERFLOW_BUCKET
    ? new BucketOverflowUploader(openBucket(config.OVERFLOW_BUCKET), config.OVERFLOW_PREFIX, config.OVERFLOW_LINK_TTL_HOURS)
    : undefined;

  const mailer = new SmtpMailer({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    secure: config.SMTP_SECURE,
    user: config.SMTP_USER,
    pass: config.SMTP_PASS,
  });

  const orchestrator = new RunOrchestrator(
    {
      store,
      lister: new YtDlpLister(createYtDlpRunner(config.YTDLP_PATH, YTDLP_TIMEOUTS.list), config.LIST_LIMIT),
      probe: new YtDlpProbe(createYtDlpRunner(config.YTDLP_PATH, YTDLP_TIMEOUTS.probe)),
      downloader: new YtDlpAudioCollector(createYtDlpRunner(config.YTDLP_PATH, YTDLP_TIMEOUTS.download), config.DATA_DIR),
      sink: new MailDeliverySink(mailer, { from: config.MAIL_FROM, to: config.MAIL_TO }, overflow),
    },
    {
      maxAttempts: config.MAX_ATTEMPTS,
      removeDeliveredFiles: !config.KEEP_DELIVERED_FILES,
    }
  );

  return { orchestrator, store };
}
