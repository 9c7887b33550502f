import { Test } from '@nestjs/testing';
import { buildPipelineConfig } from '../config/pipeline.config';
import { ResourceAddress, addressKey } from '../naming/managed-resources';
import { buildImportPlan } from './import-plan';
import { ResourceImporterService } from './resource-importer.service';
import {
  ManagedResourceDescriptor,
  TRACKED_STATE_BACKEND,
  TrackedStateBackend,
} from './tracked-state';

class InMemoryStateBackend implements TrackedStateBackend {
  readonly tracked = new Set<string>();
  readonly importErrors = new Map<string, string>();
  imports = 0;

  async has(address: ResourceAddress): Promise<boolean> {
    return this.tracked.has(addressKey(address));
  }

  async importResource(descriptor: ManagedResourceDescriptor): Promise<void> {
    this.imports += 1;
    const message = this.importErrors.get(descriptor.id);
    if (message) {
      throw new Error(message);
    }
    this.tracked.add(addressKey(descriptor.address));
  }
}

const plan = buildImportPlan(
  buildPipelineConfig({ PROJECT_NAME: 'etl-pipeline', ENVIRONMENT: 'dev' }, '/work'),
);

describe('ResourceImporterService', () => {
  let backend: InMemoryStateBackend;
  let importer: ResourceImporterService;

  beforeEach(async () => {
    backend = new InMemoryStateBackend();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ResourceImporterService,
        { provide: TRACKED_STATE_BACKEND, useValue: backend },
      ],
    }).compile();
    importer = moduleRef.get(ResourceImporterService);
  });

  it('imports every existing resource once', async () => {
    const summary = await importer.run(plan);

    expect(summary.counts).toEqual({ imported: 13, skipped: 0, absent: 0, failed: 0 });
    expect(backend.tracked.size).toBe(13);
  });

  it('skips everything on a second run', async () => {
    await importer.run(plan);
    backend.imports = 0;

    const summary = await importer.run(plan);

    expect(summary.counts).toEqual({ imported: 0, skipped: 13, absent: 0, failed: 0 });
    expect(backend.imports).toBe(0);
  });

  it('treats a missing resource as expected absence', async () => {
    backend.importErrors.set(
      'etl-pipeline-source-dev',
      'NoSuchBucket: The specified bucket does not exist',
    );

    const summary = await importer.run(plan);

    expect(summary.counts).toEqual({ imported: 12, skipped: 0, absent: 1, failed: 0 });
    expect(summary.results.find((result) => result.id === 'etl-pipeline-source-dev')).toEqual({
      description: 'Source S3 bucket',
      address: 'aws:s3/bucketV2:BucketV2::sourceBucket',
      id: 'etl-pipeline-source-dev',
      status: 'absent',
      detail: 'NoSuchBucket: The specified bucket does not exist',
    });
  });

  it('counts an unexpected error, keeps going, and does not import its children', async () => {
    backend.importErrors.set(
      'etl-pipeline-lambda-role-dev',
      'AccessDenied: User is not authorized to perform iam:GetRole',
    );

    const summary = await importer.run(plan);

    expect(summary.counts).toEqual({ imported: 10, skipped: 0, absent: 2, failed: 1 });
    expect(
      summary.results
        .filter((result) => result.status !== 'imported')
        .map((result) => [result.description, result.status, result.detail]),
    ).toEqual([
      [
        'Lambda IAM role',
        'failed',
        'AccessDenied: User is not authorized to perform iam:GetRole',
      ],
      [
        'Lambda inline policy',
        'absent',
        'parent aws:iam/role:Role::lambdaRole is not tracked',
      ],
      [
        'Lambda basic execution attachment',
        'absent',
        'parent aws:iam/role:Role::lambdaRole is not tracked',
      ],
    ]);
  });

  it('keeps results in plan order', async () => {
    const summary = await importer.run(plan);

    expect(summary.results.map((result) => result.id)).toEqual(plan.map((entry) => entry.id));
  });
});
