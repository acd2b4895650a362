// The `osc` package ships no type declarations; this covers the packet
// codec functions used by the interop tests, in `metadata: true` mode.
declare module 'osc' {
  interface OscTimeTag {
    raw: [number, number];
    native?: number;
  }

  interface OscTypedArgument {
    type: string;
    value?: unknown;
  }

  type OscArgument = OscTypedArgument | OscArgument[];

  interface OscMessagePacket {
    address: string;
    args: OscArgument[];
  }

  interface OscBundlePacket {
    timeTag: OscTimeTag;
    packets: OscPacket[];
  }

  type OscPacket = OscMessagePacket | OscBundlePacket;

  interface OscCodecOptions {
    metadata?: boolean;
    unpackSingleArgs?: boolean;
  }

  /** Encode a message or bundle */
  function writePacket(packet: OscPacket, options?: OscCodecOptions): Uint8Array;

  /** Decode a message or bundle */
  function readPacket(data: Uint8Array, options?: OscCodecOptions, offset?: number, length?: number): OscPacket;

  export {
    OscTimeTag,
    OscTypedArgument,
    OscArgument,
    OscMessagePacket,
    OscBundlePacket,
    OscPacket,
    OscCodecOptions,
    writePacket,
    readPacket,
  };
}
