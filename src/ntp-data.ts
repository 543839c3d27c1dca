export interface NtpData {
  li: number; // 2 bits from 0th byte
  vn: number; // 3 bits from 0th byte
  mode: number; // 3 bits from 0th byte
  stratum: number; // 1 byte
  poll: number; // 1 byte
  precision: number; // 1 byte
  rootDelay: number; // 4 bytes
  rootDispersion: number; // 4 bytes
  refId: string; // 4 bytes
  txTm_s: number; // 4 bytes
  txTm_f: number; // 4 bytes
  txTm: number; // (previous two fields as Unix millis)
}

export interface NtpExchange {
  localSendMs: number;
  localRecvMs: number;
  response: Buffer;
  address: string; // from socket
}

export interface QueryResult {
  readonly localSendMs: number;
  readonly localRecvMs: number;
  readonly remoteMs: number;
}

export interface OffsetEstimate {
  readonly offsetMs: number;
  readonly rttMs: number;
}
