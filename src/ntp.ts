import dgram, { RemoteInfo, Socket, SocketType } from 'dgram';
import { promises as dns } from 'dns';
import { NtpExchange } from './ntp-data';
import { buildRequest, NTP_PACKET_SIZE, NTP_PORT } from './ntp-packet';
import { ResolutionError, SendError, ShortPacketError, TimeoutError } from './errors';
import { splitIpAndPort } from './util';

export const DEFAULT_NTP_SERVER = 'pool.ntp.org';

export interface ResolvedAddress {
  address: string;
  family: number;
}

export interface NtpOptions {
  lookup?: (host: string) => Promise<ResolvedAddress>;
  createSocket?: (type: SocketType) => Socket;
  now?: () => number;
}

export type NtpQuery = (server: string, timeoutMs: number) => Promise<NtpExchange>;

export class Ntp {
  readonly server: string;
  readonly port: number;

  private lookup: (host: string) => Promise<ResolvedAddress>;
  private createSocket: (type: SocketType) => Socket;
  private now: () => number;

  constructor(server = DEFAULT_NTP_SERVER, port = NTP_PORT, options: NtpOptions = {}) {
    [this.server, this.port] = splitIpAndPort(server, port);
    this.lookup = options.lookup ?? (host => dns.lookup(host));
    this.createSocket = options.createSocket ?? (type => dgram.createSocket(type));
    this.now = options.now ?? Date.now;
  }

  async query(timeoutMs: number): Promise<NtpExchange> {
    let target: ResolvedAddress;

    try {
      target = await this.lookup(this.server);
    }
    catch (err) {
      throw new ResolutionError(this.server, err);
    }

    const socket = this.createSocket(target.family === 6 ? 'udp6' : 'udp4');

    try {
      return await this.exchange(socket, target.address, timeoutMs);
    }
    finally {
      socket.close();
    }
  }

  private exchange(socket: Socket, address: string, timeoutMs: number): Promise<NtpExchange> {
    return new Promise<NtpExchange>((resolve, reject) => {
      const packet = buildRequest();
      let localSendMs = 0;

      const responseTimer = setTimeout(() => reject(new TimeoutError(address, timeoutMs)), timeoutMs);
      const fail = (err: Error): void => {
        clearTimeout(responseTimer);
        reject(err);
      };

      const onMessage = (msg: Buffer, remoteInfo: RemoteInfo): void => {
        if (remoteInfo.address !== address || remoteInfo.port !== this.port)
          return; // Not from the server queried

        const localRecvMs = this.now();

        socket.off('message', onMessage);
        clearTimeout(responseTimer);

        if (msg.length < NTP_PACKET_SIZE)
          reject(new ShortPacketError(msg.length));
        else
          resolve({ localSendMs, localRecvMs, response: msg, address: remoteInfo.address });
      };

      socket.once('error', err => fail(new SendError(address, err)));
      socket.on('message', onMessage);

      localSendMs = this.now();

      try {
        socket.send(packet, 0, NTP_PACKET_SIZE, this.port, address, err => {
          if (err)
            fail(new SendError(address, err));
        });
      }
      catch (err) {
        fail(new SendError(address, err));
      }
    });
  }
}

export const queryNtp: NtpQuery = (server, timeoutMs) => new Ntp(server).query(timeoutMs);
