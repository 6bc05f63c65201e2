import type { PeerKey } from "../contracts/peer";

export type Datagram = {
  data: Buffer;
  peer: PeerKey;
};

/**
 * Connectionless, unreliable datagram endpoint. The daemon and the client
 * both speak through this seam; tests plug in an in-process network.
 */
export interface DatagramTransport {
  localAddress(): PeerKey;
  /** Received datagrams in arrival order; the iteration ends when the transport closes. */
  datagrams(): AsyncIterable<Datagram>;
  send(data: Uint8Array, peer: PeerKey): Promise<void>;
  close(): Promise<void>;
}
