import { MANAGED_RESOURCES } from '../naming/managed-resources';
import { trackedUrns, urnMatches } from './pulumi-state.backend';

const bucketUrn =
  'urn:pulumi:dev::etl-pipeline::aws:s3/bucketV2:BucketV2::sourceBucket';

describe('urnMatches', () => {
  it('matches on type and logical name', () => {
    expect(urnMatches(bucketUrn, MANAGED_RESOURCES.sourceBucket)).toBe(true);
  });

  it('does not confuse resources of the same type', () => {
    expect(urnMatches(bucketUrn, MANAGED_RESOURCES.destinationBucket)).toBe(false);
  });

  it('does not confuse resources with the same name', () => {
    expect(
      urnMatches(bucketUrn, { type: 'aws:s3/bucketObjectv2:BucketObjectv2', name: 'sourceBucket' }),
    ).toBe(false);
  });

  it('reads the type after any parent types', () => {
    const urn =
      'urn:pulumi:dev::etl-pipeline::pulumi:pulumi:Stack$aws:iam/role:Role::lambdaRole';

    expect(urnMatches(urn, MANAGED_RESOURCES.lambdaRole)).toBe(true);
  });

  it('rejects malformed urns', () => {
    expect(urnMatches('urn:pulumi:dev', MANAGED_RESOURCES.lambdaRole)).toBe(false);
  });
});

describe('trackedUrns', () => {
  it('collects resource urns from an exported deployment', () => {
    const deployment = {
      manifest: {},
      resources: [{ urn: bucketUrn, type: 'aws:s3/bucketV2:BucketV2' }, { id: 'no-urn' }],
    };

    expect(trackedUrns(deployment)).toEqual([bucketUrn]);
  });

  it('treats an empty stack as tracking nothing', () => {
    expect(trackedUrns({ manifest: {} })).toEqual([]);
    expect(trackedUrns(undefined)).toEqual([]);
  });
});
