import { readFileSync } from 'fs';
import { join } from 'path';
import { LayerDependencyScope, PackageVariant } from '../config/defaults';
import { DependencySelection } from './dependency-installer';

export interface BundleSpec {
  /** Entry point relative to the plan's rootDir. */
  entry: string;
  /** Output file relative to the plan's destination. */
  outfile: string;
  external: string[];
}

export interface ArtifactPlan {
  name: string;
  rootDir: string;
  /** Directory that gets archived; cleared at the start of every run. */
  archiveRoot: string;
  /** Where files land; archiveRoot itself or a directory under it. */
  destination: string;
  /** Required source files relative to rootDir, copied flat into destination. */
  files: string[];
  bundle?: BundleSpec;
  dependencies: DependencySelection;
  /** File that must survive pruning, relative to destination. */
  handlerFile?: string;
}

export interface PackagedArtifact {
  name: string;
  archiveRoot: string;
  destination: string;
  files: string[];
  contentHash: string;
  sizeBytes: number;
}

export const FUNCTION_ENTRY = 'lambda/handler.ts';
export const FUNCTION_HANDLER_FILE = 'index.js';

// Everything the bundled handler pulls in at runtime besides its own code.
export const LAYER_PACKAGES = [
  '@aws-sdk/client-glue',
  'class-transformer',
  'class-validator',
  'reflect-metadata',
];

export function readManifestDependencies(rootDir: string): Record<string, string> {
  const manifest: unknown = JSON.parse(
    readFileSync(join(rootDir, 'package.json'), 'utf-8'),
  );
  if (typeof manifest !== 'object' || manifest === null || !('dependencies' in manifest)) {
    return {};
  }
  const { dependencies } = manifest;
  if (typeof dependencies !== 'object' || dependencies === null) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(dependencies).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string',
    ),
  );
}

/** `name@range` for every package the manifest declares, bare name otherwise. */
export function pinPackages(
  packages: readonly string[],
  declared: Record<string, string>,
): string[] {
  return packages.map((name) => (declared[name] ? `${name}@${declared[name]}` : name));
}

export function buildArtifactPlans(
  rootDir: string,
  variant: PackageVariant,
  layerScope: LayerDependencyScope,
  declared: Record<string, string> = {},
): ArtifactPlan[] {
  const functionRoot = join(rootDir, 'build', 'lambda');
  const functionPlan: ArtifactPlan = {
    name: 'trigger-function',
    rootDir,
    archiveRoot: functionRoot,
    destination: functionRoot,
    files: [],
    bundle: {
      entry: FUNCTION_ENTRY,
      outfile: FUNCTION_HANDLER_FILE,
      external: variant === 'layered' ? [...LAYER_PACKAGES] : [],
    },
    dependencies: { scope: 'none' },
    handlerFile: FUNCTION_HANDLER_FILE,
  };

  if (variant === 'bundled') {
    return [functionPlan];
  }

  // Lambda resolves layer packages from /opt/nodejs/node_modules.
  const layerRoot = join(rootDir, 'build', 'lambda-layer');
  const layerPlan: ArtifactPlan = {
    name: 'dependency-layer',
    rootDir,
    archiveRoot: layerRoot,
    destination: join(layerRoot, 'nodejs'),
    files: layerScope === 'all' ? ['package.json'] : [],
    dependencies:
      layerScope === 'all'
        ? { scope: 'all' }
        : { scope: 'lightweight', packages: pinPackages(LAYER_PACKAGES, declared) },
  };

  return [functionPlan, layerPlan];
}
