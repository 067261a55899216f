export {
  parseAuthority,
  parseRequestTarget,
  type Authority,
  type RequestTarget,
} from "./uri.js";
export { HOST, decodeHeaderBytes, type HeaderLookup } from "./headers.js";
export { reqHost } from "./host.js";
export {
  listenProperties,
  connectionProperties,
  requestProperties,
  type HttpListenProperties,
  type HttpConnectionProperties,
  type HttpRequestProperties,
} from "./properties.js";
export {
  DefaultHttpPropertyExtractor,
  type HttpPropertyExtractor,
} from "./extractor.js";
