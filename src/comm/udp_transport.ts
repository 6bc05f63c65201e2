import dgram from "node:dgram";
import { isIPv6 } from "node:net";

import type { PeerKey } from "../contracts/peer";
import { errorMessage, silentLogger, type ComponentLogger } from "../observability/logger";
import { BoundedChannel } from "./bounded_channel";
import { BindError } from "./comm_errors";
import type { Datagram, DatagramTransport } from "./datagram_transport";

export type UdpTransportOptions = {
  address: string;
  port: number;
  inboxCapacity?: number;
  log?: ComponentLogger;
};

const DEFAULT_INBOX_CAPACITY = 4096;

export class UdpTransport implements DatagramTransport {
  private readonly inbox: BoundedChannel<Datagram>;
  private readonly log: ComponentLogger;
  private closing: Promise<void> | null = null;

  /** Binds the socket; rejects with BindError when the address cannot be taken. */
  static async bind(opts: UdpTransportOptions): Promise<UdpTransport> {
    const socket = dgram.createSocket({ type: isIPv6(opts.address) ? "udp6" : "udp4" });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        socket.unref();
        reject(new BindError(opts.address, opts.port, error));
      };
      socket.once("error", onError);
      socket.bind(opts.port, opts.address, () => {
        socket.off("error", onError);
        resolve();
      });
    });

    return new UdpTransport(socket, opts);
  }

  private constructor(
    private readonly socket: dgram.Socket,
    opts: UdpTransportOptions
  ) {
    this.log = opts.log ?? silentLogger;
    this.inbox = new BoundedChannel<Datagram>(opts.inboxCapacity ?? DEFAULT_INBOX_CAPACITY);

    socket.on("message", (data, rinfo) => {
      if (this.inbox.closed) return;
      const peer = { address: rinfo.address, port: rinfo.port };
      if (!this.inbox.trySend({ data, peer })) {
        this.log.warn(
          { evt: "comm.transport.inbox_full", peer, bytes: data.byteLength },
          "comm.transport.inbox_full"
        );
      }
    });

    socket.on("error", (error) => {
      this.log.error(
        { evt: "comm.transport.socket_error", error: errorMessage(error) },
        "comm.transport.socket_error"
      );
      this.inbox.close();
    });

    socket.on("close", () => {
      this.inbox.close();
    });
  }

  localAddress(): PeerKey {
    const { address, port } = this.socket.address();
    return { address, port };
  }

  datagrams(): AsyncIterable<Datagram> {
    return this.inbox;
  }

  send(data: Uint8Array, peer: PeerKey): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, peer.port, peer.address, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise<void>((resolve) => {
        this.inbox.close();
        this.socket.close(() => resolve());
      });
    }
    return this.closing;
  }
}
