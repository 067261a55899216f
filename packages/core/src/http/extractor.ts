import {
  takeNetworkStreamListenerResource,
  takeNetworkStreamResource,
} from "../resources/network.js";
import type { ResourceId, ResourceTable } from "../resources/table.js";
import type {
  NetworkStream,
  NetworkStreamAddress,
  NetworkStreamListener,
  NetworkStreamType,
} from "../transport/types.js";
import type { HeaderLookup } from "./headers.js";
import {
  connectionProperties,
  listenProperties,
  requestProperties,
  type HttpConnectionProperties,
  type HttpListenProperties,
  type HttpRequestProperties,
} from "./properties.js";
import type { RequestTarget } from "./uri.js";

/**
 * Pluggable source of listen, connection and request properties for
 * embedders that route incoming HTTP from somewhere other than the
 * resource table.
 */
export interface HttpPropertyExtractor {
  /**
   * Takes the listener registered under `rid`. Must remove the entry;
   * throws `BadResourceError` when it is absent or not a listener.
   */
  getNetworkStreamListenerForRid(
    table: ResourceTable,
    rid: ResourceId,
  ): NetworkStreamListener;

  /** Takes the stream registered under `rid`, same contract as above. */
  getNetworkStreamForRid(table: ResourceTable, rid: ResourceId): NetworkStream;

  listenProperties(
    streamType: NetworkStreamType,
    localAddress: NetworkStreamAddress,
  ): HttpListenProperties;

  connectionProperties(
    listen: HttpListenProperties,
    peerAddress: NetworkStreamAddress,
  ): HttpConnectionProperties;

  requestProperties(
    connection: HttpConnectionProperties,
    target: RequestTarget,
    headers: HeaderLookup,
  ): HttpRequestProperties;
}

export class DefaultHttpPropertyExtractor implements HttpPropertyExtractor {
  getNetworkStreamListenerForRid(
    table: ResourceTable,
    rid: ResourceId,
  ): NetworkStreamListener {
    return takeNetworkStreamListenerResource(table, rid);
  }

  getNetworkStreamForRid(table: ResourceTable, rid: ResourceId): NetworkStream {
    return takeNetworkStreamResource(table, rid);
  }

  listenProperties(
    streamType: NetworkStreamType,
    localAddress: NetworkStreamAddress,
  ): HttpListenProperties {
    return listenProperties(streamType, localAddress);
  }

  connectionProperties(
    listen: HttpListenProperties,
    peerAddress: NetworkStreamAddress,
  ): HttpConnectionProperties {
    return connectionProperties(listen, peerAddress);
  }

  requestProperties(
    connection: HttpConnectionProperties,
    target: RequestTarget,
    headers: HeaderLookup,
  ): HttpRequestProperties {
    return requestProperties(connection, target, headers);
  }
}
