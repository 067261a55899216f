export {
  addressFromServer,
  peerAddressFromSocket,
  localAddressFromSocket,
} from "./address.js";
export {
  NodeListenerResource,
  NodeStreamResource,
  type NodeHttpServer,
} from "./resources.js";
export { nodeHeaderLookup } from "./headers.js";
