declare module '@garmin/fitsdk' {
  export interface DecoderReadResult {
    messages: Record<string, Array<Record<string, unknown>> | undefined>;
    errors: Error[];
  }

  export class Decoder {
    constructor(stream: Stream);
    isFIT(): boolean;
    checkIntegrity(): boolean;
    read(): DecoderReadResult;
  }

  export class Stream {
    static fromByteArray(byteArray: Uint8Array): Stream;
  }
}
