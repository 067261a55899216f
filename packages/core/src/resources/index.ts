export {
  ResourceTable,
  type Resource,
  type ResourceId,
} from "./table.js";
export {
  LISTENER_RESOURCE_NAMES,
  STREAM_RESOURCE_NAMES,
  isNetworkStreamListener,
  isNetworkStream,
  takeNetworkStreamListenerResource,
  takeNetworkStreamResource,
} from "./network.js";
