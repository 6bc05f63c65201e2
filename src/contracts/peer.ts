// A peer is nothing more than its source address and port.
export type PeerKey = {
  address: string;
  port: number;
};

export const peerId = (peer: PeerKey): string =>
  peer.address.includes(":") ? `[${peer.address}]:${peer.port}` : `${peer.address}:${peer.port}`;

export const samePeer = (a: PeerKey, b: PeerKey): boolean =>
  a.address === b.address && a.port === b.port;
