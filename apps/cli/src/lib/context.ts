/**
 * Builds the mapper and classifier a tree command works with
 */

import { ConfigurationError } from '@transcode-mirror/core';
import { FFProbe, FilenameClassifier, ResolutionClassifier } from '@transcode-mirror/media';
import { PathMapper, type SourceClassifier } from '@transcode-mirror/sync';
import { statOrNull } from '@transcode-mirror/utils';
import type { TreeConfig } from '../config/index.js';

export interface TreeContext {
  mapper: PathMapper;
  classifier: SourceClassifier;
  minDestinationBytes: number;
}

export async function openTrees(config: TreeConfig): Promise<TreeContext> {
  const missing: string[] = [];
  for (const [label, path] of [
    ['Source', config.sourceFolder],
    ['Destination', config.destinationFolder],
  ] as const) {
    const stats = await statOrNull(path);
    if (!stats?.isDirectory()) {
      missing.push(`${label} folder does not exist: ${path}`);
    }
  }
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const mapper = new PathMapper({
    sourceRoot: config.sourceFolder,
    destinationRoot: config.destinationFolder,
    versionSuffix: config.versionSuffix,
    ignorePatterns: config.ignorePatterns,
  });

  const classifier = config.probe
    ? new ResolutionClassifier({ probe: new FFProbe(config.ffprobePath) })
    : new FilenameClassifier();

  return { mapper, classifier, minDestinationBytes: config.minOutputBytes };
}
