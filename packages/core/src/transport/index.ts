export {
  ipAddress,
  unixAddress,
  type NetworkStreamType,
  type NetworkStreamAddress,
  type IpStreamAddress,
  type UnixStreamAddress,
  type NetworkStreamListener,
  type NetworkStream,
} from "./types.js";
export { reqSchemeFromStreamType, type RequestScheme } from "./scheme.js";
export {
  isDefaultPort,
  isLocalIp,
  formatIpPort,
  percentEncodeNonAlphanumeric,
  reqHostFromAddr,
} from "./address.js";
