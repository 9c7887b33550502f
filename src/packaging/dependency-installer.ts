import { existsSync } from 'fs';
import { join } from 'path';
import { DependencyInstallError, MissingRequiredFileError } from '../common/errors';
import { CommandRunner, runCommand } from '../common/process-runner';

export type DependencySelection =
  | { scope: 'none' }
  | { scope: 'lightweight'; packages: string[] }
  | { scope: 'all' };

export interface DependencyInstaller {
  install(destination: string, selection: DependencySelection): Promise<void>;
}

export const DEPENDENCY_INSTALLER = Symbol('DEPENDENCY_INSTALLER');

export class NpmDependencyInstaller implements DependencyInstaller {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async install(destination: string, selection: DependencySelection): Promise<void> {
    if (selection.scope === 'none') {
      return;
    }

    const args = [
      'install',
      '--omit=dev',
      '--no-audit',
      '--no-fund',
      '--no-package-lock',
      '--prefix',
      destination,
    ];

    if (selection.scope === 'lightweight') {
      if (selection.packages.length === 0) {
        return;
      }
      args.push(...selection.packages);
    } else {
      const manifest = join(destination, 'package.json');
      if (!existsSync(manifest)) {
        throw new MissingRequiredFileError(manifest);
      }
    }

    const result = await this.run('npm', args, { cwd: destination, inherit: true });
    if (result.code !== 0) {
      throw new DependencyInstallError(
        `npm install (${selection.scope}) failed in ${destination} with exit code ${result.code}`,
        result.code,
      );
    }
  }
}
