/**
 * Classification Cache
 *
 * Resolution verdicts keyed by identity and source fingerprint (mtime and
 * size), so a file is probed again only after its content changes.
 */

import type { ResolutionVerdict } from '@transcode-mirror/core';

export interface CachedVerdict {
  result: ResolutionVerdict;
  fingerprint: string;
  detail?: string;
}

export class ClassificationCache {
  private entries = new Map<string, CachedVerdict>();

  get(identity: string, fingerprint: string): CachedVerdict | undefined {
    const entry = this.entries.get(identity);
    return entry?.fingerprint === fingerprint ? entry : undefined;
  }

  set(identity: string, fingerprint: string, result: ResolutionVerdict, detail?: string): void {
    this.entries.set(identity, { result, fingerprint, detail });
  }

  forget(identity: string): void {
    this.entries.delete(identity);
  }

  /**
   * Drop probe failures so the next pass probes those files again
   */
  forgetFailures(): number {
    let removed = 0;
    for (const [identity, entry] of this.entries) {
      if (entry.result === 'ProbeFailed') {
        this.entries.delete(identity);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
