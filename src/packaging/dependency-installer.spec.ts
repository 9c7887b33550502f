import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DependencyInstallError, MissingRequiredFileError } from '../common/errors';
import { CommandRunner } from '../common/process-runner';
import { NpmDependencyInstaller } from './dependency-installer';

describe('NpmDependencyInstaller', () => {
  let destination: string;
  let run: jest.MockedFunction<CommandRunner>;
  let installer: NpmDependencyInstaller;

  beforeEach(() => {
    destination = mkdtempSync(join(tmpdir(), 'installer-'));
    run = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>();
    run.mockResolvedValue({ code: 0, stdout: '', stderr: '' });
    installer = new NpmDependencyInstaller(run);
  });

  afterEach(() => {
    rmSync(destination, { recursive: true, force: true });
  });

  it('installs nothing for the none scope', async () => {
    await installer.install(destination, { scope: 'none' });

    expect(run).not.toHaveBeenCalled();
  });

  it('installs exactly the listed packages for the lightweight scope', async () => {
    await installer.install(destination, {
      scope: 'lightweight',
      packages: ['class-validator@^0.14.1', 'reflect-metadata'],
    });

    expect(run).toHaveBeenCalledWith(
      'npm',
      [
        'install',
        '--omit=dev',
        '--no-audit',
        '--no-fund',
        '--no-package-lock',
        '--prefix',
        destination,
        'class-validator@^0.14.1',
        'reflect-metadata',
      ],
      { cwd: destination, inherit: true },
    );
  });

  it('installs from the copied manifest for the all scope', async () => {
    writeFileSync(join(destination, 'package.json'), '{}');

    await installer.install(destination, { scope: 'all' });

    expect(run.mock.calls[0][1]).toEqual([
      'install',
      '--omit=dev',
      '--no-audit',
      '--no-fund',
      '--no-package-lock',
      '--prefix',
      destination,
    ]);
  });

  it('requires a manifest for the all scope', async () => {
    await expect(installer.install(destination, { scope: 'all' })).rejects.toBeInstanceOf(
      MissingRequiredFileError,
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('reports a non-zero npm exit', async () => {
    run.mockResolvedValue({ code: 1, stdout: '', stderr: 'ERR! 404' });

    const error = await installer
      .install(destination, { scope: 'lightweight', packages: ['left-pad'] })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DependencyInstallError);
    expect(error).toHaveProperty('exitCode', 1);
  });
});
