import type {
  NetworkStream,
  NetworkStreamListener,
  NetworkStreamType,
} from "../transport/types.js";
import type { Resource, ResourceId, ResourceTable } from "./table.js";

export const LISTENER_RESOURCE_NAMES: Readonly<
  Record<NetworkStreamType, string>
> = {
  tcp: "tcpListener",
  tls: "tlsListener",
  unix: "unixListener",
};

export const STREAM_RESOURCE_NAMES: Readonly<
  Record<NetworkStreamType, string>
> = {
  tcp: "tcpStream",
  tls: "tlsStream",
  unix: "unixStream",
};

const LISTENER_NAMES = new Set(Object.values(LISTENER_RESOURCE_NAMES));
const STREAM_NAMES = new Set(Object.values(STREAM_RESOURCE_NAMES));

export function isNetworkStreamListener(
  resource: Resource,
): resource is NetworkStreamListener {
  return (
    LISTENER_NAMES.has(resource.name) &&
    "streamType" in resource &&
    "localAddress" in resource
  );
}

export function isNetworkStream(
  resource: Resource,
): resource is NetworkStream {
  return (
    STREAM_NAMES.has(resource.name) &&
    "streamType" in resource &&
    "peerAddress" in resource
  );
}

export function takeNetworkStreamListenerResource(
  table: ResourceTable,
  rid: ResourceId,
): NetworkStreamListener {
  return table.take(rid, isNetworkStreamListener, "network stream listener");
}

export function takeNetworkStreamResource(
  table: ResourceTable,
  rid: ResourceId,
): NetworkStream {
  return table.take(rid, isNetworkStream, "network stream");
}
