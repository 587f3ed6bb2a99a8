/**
 * Quality flags per encoder family.
 *
 * NVENC encoders take a constant-quality target, AMF encoders a fixed QP for
 * P and I frames, everything else a constant rate factor.
 */

export type EncoderFamily = 'nvenc' | 'amf' | 'crf';

export function getEncoderFamily(encoder: string): EncoderFamily {
  const name = encoder.trim().toLowerCase();
  if (name.endsWith('nvenc')) return 'nvenc';
  if (name.endsWith('amf')) return 'amf';
  return 'crf';
}

export function getQualityArgs(encoder: string, quality: string): string[] {
  switch (getEncoderFamily(encoder)) {
    case 'nvenc':
      return ['-cq', quality];
    case 'amf':
      return ['-rc', 'cqp', '-qp_p', quality, '-qp_i', quality];
    case 'crf':
      return ['-crf', quality];
  }
}
