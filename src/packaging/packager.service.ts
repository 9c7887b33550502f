import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { copyFileSync, existsSync, mkdirSync, readFileSync, rmSync, statSync } from 'fs';
import { basename, join, resolve } from 'path';
import { buildSync } from 'esbuild';
import { MissingRequiredFileError } from '../common/errors';
import { ArtifactPlan, BundleSpec, PackagedArtifact } from './artifact-plan';
import { listFiles, pruneDenied } from './denylist';
import { DEPENDENCY_INSTALLER, DependencyInstaller } from './dependency-installer';

@Injectable()
export class PackagerService {
  private readonly logger = new Logger(PackagerService.name);

  constructor(
    @Inject(DEPENDENCY_INSTALLER) private readonly installer: DependencyInstaller,
  ) {}

  async packageAll(plans: ArtifactPlan[]): Promise<PackagedArtifact[]> {
    const artifacts: PackagedArtifact[] = [];
    for (const plan of plans) {
      artifacts.push(await this.package(plan));
    }
    return artifacts;
  }

  async package(plan: ArtifactPlan): Promise<PackagedArtifact> {
    this.logger.log(`Packaging ${plan.name} into ${plan.destination}`);

    // Cleared first, so a failed run never leaves a stale artifact looking complete.
    rmSync(plan.archiveRoot, { recursive: true, force: true });
    mkdirSync(plan.destination, { recursive: true });

    const required = [...plan.files, ...(plan.bundle ? [plan.bundle.entry] : [])];
    for (const file of required) {
      if (!existsSync(resolve(plan.rootDir, file))) {
        throw new MissingRequiredFileError(file);
      }
    }

    if (plan.bundle) {
      this.bundle(plan.rootDir, plan.destination, plan.bundle);
    }
    for (const file of plan.files) {
      copyFileSync(resolve(plan.rootDir, file), join(plan.destination, basename(file)));
    }

    this.logger.log(`Installing dependencies (scope: ${plan.dependencies.scope})`);
    await this.installer.install(plan.destination, plan.dependencies);

    const removed = pruneDenied(plan.archiveRoot);
    this.logger.log(`Pruned ${removed.length} build/test/doc path(s)`);

    if (plan.handlerFile && !existsSync(join(plan.destination, plan.handlerFile))) {
      throw new MissingRequiredFileError(join(plan.destination, plan.handlerFile));
    }

    const artifact = this.describe(plan);
    this.logger.log(
      `${plan.name} ready: ${artifact.files.length} file(s), ` +
        `${(artifact.sizeBytes / 1024).toFixed(1)} KiB, sha256 ${artifact.contentHash}`,
    );
    return artifact;
  }

  private bundle(rootDir: string, destination: string, spec: BundleSpec): void {
    buildSync({
      entryPoints: [resolve(rootDir, spec.entry)],
      outfile: join(destination, spec.outfile),
      bundle: true,
      minify: true,
      platform: 'node',
      format: 'cjs',
      target: 'node20',
      external: spec.external,
      sourcemap: false,
      logLevel: 'warning',
    });
  }

  private describe(plan: ArtifactPlan): PackagedArtifact {
    const files = listFiles(plan.archiveRoot);
    const hash = createHash('sha256');
    let sizeBytes = 0;

    for (const file of files) {
      const absolute = join(plan.archiveRoot, file);
      sizeBytes += statSync(absolute).size;
      hash.update(file);
      hash.update('\0');
      hash.update(readFileSync(absolute));
      hash.update('\0');
    }

    return {
      name: plan.name,
      archiveRoot: plan.archiveRoot,
      destination: plan.destination,
      files,
      contentHash: hash.digest('hex'),
      sizeBytes,
    };
  }
}
