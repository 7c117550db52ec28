/**
 * Encoder configuration snapshot
 */

export const HW_ENCODING_TYPES = ['nvidia', 'intel'] as const;
export const ENCODING_QUALITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;
export const ENCODING_CODECS = ['hevc', 'av1'] as const;

export type HwEncodingType = typeof HW_ENCODING_TYPES[number];
export type EncodingQuality = typeof ENCODING_QUALITIES[number];
export type EncodingCodec = typeof ENCODING_CODECS[number];

/**
 * Applied uniformly to every Encode action; never mutated per item.
 */
export interface EncodeOptions {
  readonly hwAccel: boolean;
  readonly hwType: HwEncodingType;
  readonly quality: EncodingQuality;
  readonly codec: EncodingCodec;
}

export function createEncodeOptions(options: EncodeOptions): Readonly<EncodeOptions> {
  return Object.freeze({ ...options });
}
