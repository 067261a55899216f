import type {
  NetworkStream,
  NetworkStreamAddress,
  NetworkStreamListener,
  NetworkStreamType,
} from "../transport/types.js";
import {
  LISTENER_RESOURCE_NAMES,
  STREAM_RESOURCE_NAMES,
} from "../resources/network.js";

export interface FakeListener extends NetworkStreamListener {
  closed: boolean;
}

export interface FakeStream extends NetworkStream {
  closed: boolean;
}

/** In-memory listener resource for tests; no socket is bound. */
export function createFakeListener(
  streamType: NetworkStreamType,
  address: NetworkStreamAddress,
): FakeListener {
  return {
    name: LISTENER_RESOURCE_NAMES[streamType],
    streamType,
    closed: false,
    localAddress: () => address,
    close() {
      this.closed = true;
    },
  };
}

/** In-memory stream resource for tests. */
export function createFakeStream(
  streamType: NetworkStreamType,
  local: NetworkStreamAddress,
  peer: NetworkStreamAddress,
): FakeStream {
  return {
    name: STREAM_RESOURCE_NAMES[streamType],
    streamType,
    closed: false,
    localAddress: () => local,
    peerAddress: () => peer,
    close() {
      this.closed = true;
    },
  };
}
