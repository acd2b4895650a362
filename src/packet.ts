/**
 * Packet-level helpers
 *
 * A packet is whatever travels in one datagram or one stream frame: a
 * Message or a Bundle, told apart by the "#bundle" magic.
 */

import { Bundle, isBundle } from './bundle';
import { OscError, toOscError } from './errors';
import { Message } from './message';

export type Packet = Message | Bundle;

/** Shortest well-formed packet: a 4-byte path plus a 4-byte ",\0\0\0" */
export const MIN_PACKET_SIZE = 8;

export type DecodeResult = { ok: true; packet: Packet } | { ok: false; error: OscError };

export function deserializePacket(data: Uint8Array): Packet {
  if (data.length === 0) {
    throw new OscError('MalformedPacket', 'Empty packet');
  }
  return isBundle(data) ? Bundle.deserialize(data) : Message.deserialize(data);
}

/** Like deserializePacket, but reports failure as a value instead of throwing */
export function decodePacket(data: Uint8Array): DecodeResult {
  try {
    return { ok: true, packet: deserializePacket(data) };
  } catch (err) {
    return { ok: false, error: toOscError(err, 'MalformedPacket') };
  }
}

export function serializePacket(packet: Packet): Buffer {
  return packet.serialize();
}

export function isMessage(packet: Packet): packet is Message {
  return packet instanceof Message;
}
