import { ResourceAddress } from '../naming/managed-resources';

/** One externally provisioned resource the stack should track. */
export interface ManagedResourceDescriptor {
  address: ResourceAddress;
  /** Identifier the provider uses to look the resource up (name, ARN, composite id). */
  id: string;
  description: string;
  /** Must already be tracked before this descriptor is attempted. */
  parent?: ResourceAddress;
}

export interface TrackedStateBackend {
  has(address: ResourceAddress): Promise<boolean>;
  importResource(descriptor: ManagedResourceDescriptor): Promise<void>;
}

export const TRACKED_STATE_BACKEND = Symbol('TRACKED_STATE_BACKEND');
