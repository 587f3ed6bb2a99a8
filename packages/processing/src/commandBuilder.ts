/**
 * FFmpeg Command Builder
 *
 * Fluent API for building the encode command. Global flags such as -y and
 * -progress are added by the FFmpeg wrapper, not here.
 */

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:1'
}

export interface VideoCodecOptions {
  codec: string;
  pixFmt?: string;
  extraArgs?: string[];   // Quality flags and the like
}

export interface AudioCodecOptions {
  codec: string;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private audioDisabled = false;
  private videoFilters: string[] = [];
  private outputFile: string = '';

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  mapVideo(inputIndex: number = 0, streamIndex: number = 0): this {
    return this.map(inputIndex, `v:${streamIndex}`);
  }

  mapAudio(inputIndex: number = 0, streamIndex: number = 0): this {
    return this.map(inputIndex, `a:${streamIndex}`);
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    this.audioDisabled = false;
    return this;
  }

  /**
   * Drop audio from the output (-an)
   */
  disableAudio(): this {
    this.audioCodec = null;
    this.audioDisabled = true;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    // Video filters
    if (this.videoFilters.length > 0) {
      args.push('-vf', this.videoFilters.join(','));
    }

    // Mappings
    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      if (this.videoCodec.extraArgs) args.push(...this.videoCodec.extraArgs);
    }

    // Audio codec
    if (this.audioDisabled) {
      args.push('-an');
    } else if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}
