export {
  RequestContextError,
  BadResourceError,
  UnknownConnectionError,
  type BadResourceReason,
} from "./catalog.js";
