import { NTP_BASE, NTP_PACKET_SIZE } from './ntp-packet';

export interface PacketFields {
  unixSeconds?: number;
  seconds?: number; // raw NTP seconds, overrides unixSeconds
  fraction?: number;
  li?: number;
  vn?: number;
  mode?: number;
  stratum?: number;
  refId?: number[];
}

export function serverPacket(fields: PacketFields = {}): Buffer {
  const packet = Buffer.alloc(NTP_PACKET_SIZE);
  const { li = 0, vn = 4, mode = 4, stratum = 2, refId = [192, 0, 2, 1], fraction = 0 } = fields;

  packet[0] = (li << 6) | (vn << 3) | mode;
  packet[1] = stratum;
  packet[2] = 6;
  packet[3] = 0xEC; // precision -20
  refId.forEach((b, i) => packet[12 + i] = b);
  packet.writeUInt32BE(fields.seconds ?? (fields.unixSeconds ?? 1767225600) + NTP_BASE, 40);
  packet.writeUInt32BE(fraction, 44);

  return packet;
}
