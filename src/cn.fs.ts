import { S3Client } from '@aws-sdk/client-s3';
import { fsa, FsHttp } from '@chunkd/fs';
import { FsAwsS3 } from '@chunkd/fs-aws';

// Configuration files and url lists may live locally, in s3 or behind http
fsa.register('s3://', new FsAwsS3(new S3Client()));
fsa.register('https://', new FsHttp());
fsa.register('http://', new FsHttp());
