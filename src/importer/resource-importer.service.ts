import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { addressKey } from '../naming/managed-resources';
import { ImportResult, ImportSummary, isExpectedAbsence, summarize } from './import-outcome';
import {
  ManagedResourceDescriptor,
  TRACKED_STATE_BACKEND,
  TrackedStateBackend,
} from './tracked-state';

@Injectable()
export class ResourceImporterService {
  private readonly logger = new Logger(ResourceImporterService.name);

  constructor(
    @Inject(TRACKED_STATE_BACKEND) private readonly backend: TrackedStateBackend,
  ) {}

  /**
   * Imports each descriptor in order. Never stops early: unexpected failures
   * are counted and reported in the summary.
   */
  async run(plan: readonly ManagedResourceDescriptor[]): Promise<ImportSummary> {
    const results: ImportResult[] = [];
    for (const descriptor of plan) {
      results.push(await this.importOne(descriptor));
    }

    const summary = summarize(results);
    const { imported, skipped, absent, failed } = summary.counts;
    const line =
      `Import finished: ${imported} imported, ${skipped} already tracked, ` +
      `${absent} not found, ${failed} failed`;
    if (failed > 0) {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }
    return summary;
  }

  private async importOne(descriptor: ManagedResourceDescriptor): Promise<ImportResult> {
    const { description, id } = descriptor;
    const base = { description, id, address: addressKey(descriptor.address) };

    this.logger.log(`Checking ${description}...`);

    try {
      if (await this.backend.has(descriptor.address)) {
        this.logger.warn(`  ${description}: already in state, skipping`);
        return { ...base, status: 'skipped' };
      }

      if (descriptor.parent && !(await this.backend.has(descriptor.parent))) {
        const detail = `parent ${addressKey(descriptor.parent)} is not tracked`;
        this.logger.warn(`  ${description}: ${detail}, nothing to import`);
        return { ...base, status: 'absent', detail };
      }

      this.logger.log(`  ${description}: importing ${id}`);
      await this.backend.importResource(descriptor);
      this.logger.log(`  ${description}: imported`);
      return { ...base, status: 'imported' };
    } catch (error) {
      const detail = errorMessage(error);
      if (isExpectedAbsence(detail)) {
        this.logger.warn(`  ${description}: not found, will be created on apply`);
        return { ...base, status: 'absent', detail };
      }
      this.logger.error(`  ${description}: failed to import: ${detail}`);
      return { ...base, status: 'failed', detail };
    }
  }
}
