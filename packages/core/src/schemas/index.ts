export {
  DEFAULTS,
  ServerConfigSchema,
  ListenerConfigSchema,
  TcpListenerConfigSchema,
  TlsListenerConfigSchema,
  UnixListenerConfigSchema,
  type ServerConfig,
  type ListenerConfig,
  type LoggingConfig,
} from "./server-config.js";
