import { Injectable } from '@nestjs/common';
import { ResourceAddress } from '../naming/managed-resources';
import { StackService } from '../stack/stack.service';
import { ManagedResourceDescriptor, TrackedStateBackend } from './tracked-state';

/** URNs of every resource in an exported deployment. */
export function trackedUrns(deployment: unknown): string[] {
  if (typeof deployment !== 'object' || deployment === null || !('resources' in deployment)) {
    return [];
  }
  const { resources } = deployment;
  if (!Array.isArray(resources)) {
    return [];
  }
  return resources.flatMap((resource: unknown) =>
    typeof resource === 'object' &&
    resource !== null &&
    'urn' in resource &&
    typeof resource.urn === 'string'
      ? [resource.urn]
      : [],
  );
}

// urn:pulumi:<stack>::<project>::<parent$...$type>::<name>
export function urnMatches(urn: string, address: ResourceAddress): boolean {
  const parts = urn.split('::');
  if (parts.length < 4) {
    return false;
  }
  const type = parts[2].split('$').pop();
  const name = parts.slice(3).join('::');
  return type === address.type && name === address.name;
}

@Injectable()
export class PulumiStateBackend implements TrackedStateBackend {
  constructor(private readonly stacks: StackService) {}

  async has(address: ResourceAddress): Promise<boolean> {
    const stack = await this.stacks.getStack();
    const exported = await stack.exportStack();
    return trackedUrns(exported.deployment).some((urn) => urnMatches(urn, address));
  }

  async importResource(descriptor: ManagedResourceDescriptor): Promise<void> {
    const stack = await this.stacks.getStack();
    await stack.import({
      resources: [
        {
          type: descriptor.address.type,
          name: descriptor.address.name,
          id: descriptor.id,
        },
      ],
      protect: false,
      generateCode: false,
    });
  }
}
