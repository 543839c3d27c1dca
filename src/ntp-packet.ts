import { NtpData } from './ntp-data';
import {
  InvalidModeError, InvalidStratumError, InvalidTimestampError, InvalidVersionError, ShortPacketError,
  UnsynchronizedError
} from './errors';

export const NTP_BASE = 2208988800; // Seconds before 1970-01-01 epoch for 1900-01-01 epoch
export const NTP_PACKET_SIZE = 48;
export const NTP_PORT = 123;

const CLIENT_HEADER = 0x23; // LI = 0, VN = 4, Mode = 3 (client)
const MODE_SERVER = 4;
const LI_UNSYNCHRONIZED = 3;
const FRACTION_SCALE = 0x100000000;

export function buildRequest(): Buffer {
  const packet = Buffer.alloc(NTP_PACKET_SIZE);

  packet[0] = CLIENT_HEADER;

  return packet;
}

function refIdOf(msg: Buffer, stratum: number): string {
  if (stratum < 2) {
    // As short ID string
    return msg.subarray(12, 16).toString('latin1').replace(/[^\x20-\x7E]/g, '').trim();
  }

  return msg[12] + '.' + msg[13] + '.' + msg[14] + '.' + msg[15]; // As IPv4 address
}

/**
 * Converts an NTP timestamp (seconds and 32-bit binary fraction since 1900) into Unix epoch milliseconds,
 * flooring the fractional part. Every intermediate value stays below 2^53.
 */
export function ntpToUnixMillis(seconds: number, fraction: number): number {
  if (seconds < NTP_BASE)
    throw new InvalidTimestampError(seconds);

  return (seconds - NTP_BASE) * 1000 + Math.floor(fraction * 1000 / FRACTION_SCALE);
}

export function parseResponse(msg: Buffer): NtpData {
  if (msg.length < NTP_PACKET_SIZE)
    throw new ShortPacketError(msg.length);

  const header = msg.readUInt8(0);
  const mode = header & 0x07;

  if (mode !== MODE_SERVER)
    throw new InvalidModeError(mode);

  const stratum = msg.readUInt8(1);

  if (stratum === 0)
    throw new InvalidStratumError(refIdOf(msg, stratum));

  const vn = (header & 0x38) >> 3;

  if (vn < 1 || vn > 4)
    throw new InvalidVersionError(vn);

  const li = (header & 0xC0) >> 6;

  if (li === LI_UNSYNCHRONIZED)
    throw new UnsynchronizedError();

  const txTm_s = msg.readUInt32BE(40);
  const txTm_f = msg.readUInt32BE(44);

  return {
    li,
    vn,
    mode,

    stratum,
    poll: msg.readInt8(2),
    precision: msg.readInt8(3),

    rootDelay: msg.readUInt32BE(4),
    rootDispersion: msg.readUInt32BE(8),
    refId: refIdOf(msg, stratum),

    txTm_s,
    txTm_f,
    txTm: ntpToUnixMillis(txTm_s, txTm_f)
  };
}
