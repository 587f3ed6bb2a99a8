/**
 * @subburn/subtitles
 *
 * Subtitle extraction and text transforms.
 */

export {
  SubtitleExtractor,
  BITMAP_SUBTITLE_CODECS,
  isBitmapSubtitleCodec,
  buildExtractArgs,
  type SubtitleExtractorConfig,
  type ExtractOptions,
} from './extractor.js';

export {
  SubtitleTransformer,
  stripMarkup,
  reformat,
  openingFontTag,
} from './transformer.js';

export {
  parseCues,
  parseTimingLine,
  splitLines,
  type SourceLine,
} from './srtParser.js';

export type {
  Cue,
  ExtractionMethod,
  ExtractResult,
  ParseResult,
  SubtitleFont,
} from './types.js';
