/**
 * OSC core
 *
 * Open Sound Control 1.0/1.1 encoding, address-pattern dispatch, and
 * UDP / TCP / Unix-socket transports.
 *
 *   const server = new Server(9000, 'udp');
 *   server.addMethod('/mixer/ch/[1-8]/gain', 'f', (msg) => { ... });
 *   const thread = new ServerThread(server);
 *   await thread.start();
 *
 *   const target = new Address('127.0.0.1', 9000);
 *   await target.send(new Message('/mixer/ch/3/gain').addFloat(0.8));
 */

export { OscError, isOscError, errorMessage, toOscError } from './errors';
export type { OscErrorCode, ErrorContext } from './errors';
export { initLogger, getLogger, getRootLogger } from './logger';
export type { LogLevel, LoggerConfig } from './logger';
export { TimeTag, NTP_EPOCH_OFFSET } from './time-tag';
export { Value, TYPE_TAGS, packColor, unpackColor } from './value';
export type { ValueData, ValueKind, RGBAColor, MidiMessage } from './value';
export { Message } from './message';
export { Bundle, MAX_BUNDLE_DEPTH, isBundle } from './bundle';
export type { BundleElement } from './bundle';
export { deserializePacket, decodePacket, serializePacket, MIN_PACKET_SIZE } from './packet';
export type { Packet, DecodeResult } from './packet';
export { matchPattern, validatePattern, compilePattern, MAX_MATCH_DEPTH } from './pattern';
export type { CompiledPattern } from './pattern';
export { Dispatcher } from './dispatcher';
export type { Method, MethodHandler, BundleHook, ErrorHandler } from './dispatcher';
export { encodeFrame, decodeFrame, FrameReader, sendFramed } from './transport/frame-codec';
export type { FrameOptions, DecodedFrame } from './transport/frame-codec';
export { formatUrl, parseUrl, isStreamProtocol, isMulticastAddress } from './transport/url';
export type { Protocol, Endpoint } from './transport/url';
export type { TransportStats } from './transport/transport-stats';
export { PacketQueue } from './transport/packet-queue';
export type { QueuedPacket } from './transport/packet-queue';
export { Address } from './transport/address';
export type { AddressOptions } from './transport/address';
export { Server } from './transport/server';
export type { ServerOptions } from './transport/server';
export { ServerThread } from './transport/server-thread';
export type { ServerThreadOptions } from './transport/server-thread';
export { loadConfig, parseConfig, createServers, createAddresses, defaultConfig } from './config';
export type { Config } from './config';
