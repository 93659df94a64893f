import * as path from 'path';
import { config } from './config/env.config';
import { parseUploaderArgs, type UploaderArgs } from './config/uploader.config';
import { S3Service } from './services/s3.service';
import { UploaderService } from './services/uploader.service';
import { UploadScheduler } from './services/uploadScheduler.service';
import { deriveDeviceCredentials, readDeviceSerial } from './utils/deviceCredentials';

const resolveCredentials = async (args: UploaderArgs): Promise<{ user: string; password: string }> => {
  if (args.user && args.password) {
    return { user: args.user, password: args.password };
  }

  const serial = await readDeviceSerial(config.upload.serialNumberPath);
  const derived = deriveDeviceCredentials(serial, config.upload.deviceNamePrefix);
  return { user: args.user ?? derived.user, password: args.password ?? derived.password };
};

const main = async () => {
  const args = parseUploaderArgs(process.argv.slice(2));
  const { user, password } = await resolveCredentials(args);

  // Explicit access keys win; otherwise the store is expected to know the device by its derived login
  const s3Service = new S3Service({
    region: config.aws.region,
    bucketName: config.aws.s3BucketName,
    accessKeyId: config.aws.accessKeyId || user,
    secretAccessKey: config.aws.secretAccessKey || password,
    endpoint: config.aws.endpoint || undefined,
  });

  if (!s3Service.isConfigured()) {
    console.error('❌ S3 is not configured, set AWS_S3_BUCKET_NAME');
    process.exit(1);
  }

  const uploader = new UploaderService(s3Service, {
    localDirectory: path.join(args.output, 'videos'),
    keyPrefix: `${config.aws.prefix}/${user}`,
    minAgeSeconds: config.upload.minAgeSeconds,
  });

  const scheduler = new UploadScheduler(
    async () => {
      const { uploaded, failed, skipped } = await uploader.uploadPendingRecordings();
      console.log(`☁️ Upload pass done: ${uploaded.length} uploaded, ${failed.length} failed, ${skipped.length} still being written`);
    },
    {
      window: { startHour: config.upload.startHour, endHour: config.upload.endHour },
      intervalMs: config.upload.checkIntervalMs,
    },
  );

  console.log(`☁️ Uploader for ${user}: ${args.output}/videos -> s3://${s3Service.bucketName}/${config.aws.prefix}/${user}`);

  if (args.once) {
    await scheduler.tick();
    return;
  }

  await scheduler.run();
};

main().catch((error) => {
  console.error('❌ Uploader failed:', error);
  process.exit(1);
});
