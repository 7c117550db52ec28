import { describe, it, expect, vi } from 'vitest';
import { ProbeError } from '@transcode-mirror/core';
import { FilenameClassifier, ResolutionClassifier, normalizedHeight } from './classifier.js';
import { qualityHintFromName } from './qualityMarkers.js';
import type { MediaProbe, VideoDimensions } from './types.js';

function probeReturning(dimensions: VideoDimensions): MediaProbe & { probeDimensions: ReturnType<typeof vi.fn> } {
  return { probeDimensions: vi.fn().mockResolvedValue(dimensions) };
}

describe('normalizedHeight', () => {
  it('uses the plain height for 16:9 video', () => {
    expect(normalizedHeight({ width: 1920, height: 1080 })).toBe(1080);
    expect(normalizedHeight({ width: 1280, height: 720 })).toBe(720);
  });

  it('counts letterboxed video by its width', () => {
    expect(normalizedHeight({ width: 1920, height: 800 })).toBe(1080);
    expect(normalizedHeight({ width: 1280, height: 536 })).toBe(720);
  });

  it('turns portrait video on its side', () => {
    expect(normalizedHeight({ width: 720, height: 1280 })).toBe(720);
  });

  it('keeps 4:3 heights', () => {
    expect(normalizedHeight({ width: 1440, height: 1080 })).toBe(1080);
    expect(normalizedHeight({ width: 960, height: 720 })).toBe(720);
  });
});

describe('ResolutionClassifier', () => {
  it('classifies 720p and below as already low resolution', async () => {
    const probe = probeReturning({ width: 1280, height: 720 });
    const classifier = new ResolutionClassifier({ probe });

    const result = await classifier.classify('/src/Movie.mkv');

    expect(result.verdict).toBe('AlreadyLowRes');
    expect(result.basis).toBe('probe');
    expect(result.normalizedHeight).toBe(720);
    expect(probe.probeDimensions).toHaveBeenCalledTimes(1);
  });

  it('classifies anything taller as needing an encode', async () => {
    const classifier = new ResolutionClassifier({ probe: probeReturning({ width: 1920, height: 1080 }) });

    await expect(classifier.classify('/src/Movie.mkv')).resolves.toMatchObject({
      verdict: 'NeedsEncode',
      dimensions: { width: 1920, height: 1080 },
    });
  });

  it('reports probe failures as their own verdict', async () => {
    const probe: MediaProbe = {
      probeDimensions: vi.fn().mockRejectedValue(new ProbeError('/src/Broken.mkv', 'moov atom not found')),
    };
    const classifier = new ResolutionClassifier({ probe });

    const result = await classifier.classify('/src/Broken.mkv');

    expect(result.verdict).toBe('ProbeFailed');
    expect(result.error).toBe('Probe failed for /src/Broken.mkv: moov atom not found');
  });

  it('trusts filename markers without probing', async () => {
    const probe = probeReturning({ width: 1920, height: 1080 });
    const classifier = new ResolutionClassifier({ probe });

    await expect(classifier.classify('/src/Show.S01E01.720p.WEBRip.mkv')).resolves.toEqual({
      verdict: 'AlreadyLowRes',
      basis: 'filename',
    });
    await expect(classifier.classify('/src/Movie.2019.1080p.HDTV.mkv')).resolves.toEqual({
      verdict: 'NeedsEncode',
      basis: 'filename',
    });
    expect(probe.probeDimensions).not.toHaveBeenCalled();
  });

  it('probes every call when hints are disabled', async () => {
    const probe = probeReturning({ width: 1920, height: 1080 });
    const classifier = new ResolutionClassifier({ probe, useFilenameHints: false });

    await classifier.classify('/src/Show.720p.mkv');
    await classifier.classify('/src/Show.720p.mkv');

    expect(probe.probeDimensions).toHaveBeenCalledTimes(2);
  });

  it('honours a custom threshold', async () => {
    const classifier = new ResolutionClassifier({
      probe: probeReturning({ width: 1920, height: 1080 }),
      maxHeight: 1080,
    });

    await expect(classifier.classify('/src/Movie.mkv')).resolves.toMatchObject({ verdict: 'AlreadyLowRes' });
  });
});

describe('FilenameClassifier', () => {
  it('skips only names marked as low resolution', async () => {
    const classifier = new FilenameClassifier();

    await expect(classifier.classify('/m/Show.S01E01.720p.mkv')).resolves.toEqual({ verdict: 'AlreadyLowRes', basis: 'filename' });
    await expect(classifier.classify('/m/Movie.mkv')).resolves.toEqual({ verdict: 'NeedsEncode', basis: 'filename' });
    await expect(classifier.classify('/m/Movie.1080p.720p.mkv')).resolves.toEqual({ verdict: 'NeedsEncode', basis: 'filename' });
  });
});

describe('qualityHintFromName', () => {
  it('matches whole tokens only', () => {
    expect(qualityHintFromName('Wednesday.S01E01.mkv')).toBeNull();
    expect(qualityHintFromName('Old.Show.SD.mkv')).toBe('low');
    expect(qualityHintFromName('Film.4K.HDR.mkv')).toBe('high');
    expect(qualityHintFromName('Film.BDRemux.mkv')).toBe('high');
  });
});
