/**
 * Subcommand execution and result rendering
 *
 * Results go to `out` (stdout); nothing here exits the process or
 * catches storage errors.
 */

import type { ObjectMetadata, ProjectStorageClient } from '@scoped-s3/storage';
import type { Command } from './args.js';

export type StorageCommand = Exclude<Command, { command: 'env' } | { command: 'help' }>;

export type Print = (line: string) => void;

function iso(date: Date | undefined): string {
  return date ? date.toISOString() : '-';
}

function renderMetadata(key: string, bucket: string, head: ObjectMetadata, print: Print): void {
  print(`Object '${key}' in bucket '${bucket}'`);
  print(`  size: ${head.size} bytes`);
  print(`  content type: ${head.contentType ?? '-'}`);
  print(`  etag: ${head.etag ?? '-'}`);
  print(`  updated at: ${iso(head.lastModified)}`);

  const entries = Object.entries(head.metadata);
  if (entries.length > 0) {
    print('  metadata:');
    for (const [name, value] of entries) {
      print(`    ${name}: ${value}`);
    }
  }
}

export async function runCommand(client: ProjectStorageClient, command: StorageCommand, print: Print): Promise<void> {
  switch (command.command) {
    case 'create-bucket':
      await client.createBucket(command.name);
      print(`Bucket created: ${command.name}`);
      return;

    case 'delete-bucket':
      await client.deleteBucket(command.name);
      print(`Bucket deleted: ${command.name}`);
      return;

    case 'list-buckets': {
      const buckets = await client.listBuckets();
      if (buckets.length === 0) {
        print('No buckets');
        return;
      }
      print('Buckets:');
      for (const bucket of buckets) {
        print(`- ${bucket.name} (created at: ${iso(bucket.createdAt)})`);
      }
      return;
    }

    case 'put-object': {
      const result = await client.putObjectFromFile(command.bucket, command.key, command.filePath, {
        contentType: command.contentType,
        metadata: command.metadata,
      });
      print(`Object created: ${command.key} in bucket ${command.bucket} (etag: ${result.etag ?? '-'})`);
      return;
    }

    case 'get-object': {
      const result = await client.getObjectToFile(command.bucket, command.key, command.output);
      print(`Object '${command.key}' downloaded to ${command.output}, size: ${result.bytesWritten} bytes`);
      return;
    }

    case 'copy-object': {
      const result = await client.copyObject(
        { bucket: command.sourceBucket, key: command.sourceKey },
        { bucket: command.bucket, key: command.key }
      );
      print(
        `Object copied: ${command.sourceBucket}/${command.sourceKey} to ${command.bucket}/${command.key} (etag: ${result.etag ?? '-'})`
      );
      return;
    }

    case 'delete-object':
      await client.deleteObject(command.bucket, command.key);
      print(`Object '${command.key}' deleted`);
      return;

    case 'list-objects': {
      const listing = await client.listObjects(command.bucket, { continuationToken: command.continuationToken });
      if (listing.objects.length === 0) {
        print(`No objects in bucket '${command.bucket}'`);
      } else {
        print(`Objects in bucket '${command.bucket}':`);
        for (const object of listing.objects) {
          print(`- ${object.key} (${object.size ?? 0} bytes, updated at: ${iso(object.lastModified)})`);
        }
      }
      if (listing.isTruncated) {
        const next = listing.nextContinuationToken ? `; next page: --continuation-token ${listing.nextContinuationToken}` : '';
        print(`Listing truncated${next}`);
      }
      return;
    }

    case 'head-object': {
      const head = await client.headObject(command.bucket, command.key);
      renderMetadata(command.key, command.bucket, head, print);
      return;
    }
  }
}
