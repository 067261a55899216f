import { z } from "zod";

export const DEFAULTS = {
  listeners: [
    {
      transport: "tcp" as const,
      hostname: "127.0.0.1",
      port: 8080,
    },
  ],
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

const PortSchema = z.number().int().min(0).max(65535);

export const TcpListenerConfigSchema = z.object({
  transport: z.literal("tcp"),
  hostname: z.string().min(1).default("127.0.0.1"),
  port: PortSchema,
});

export const TlsListenerConfigSchema = z.object({
  transport: z.literal("tls"),
  hostname: z.string().min(1).default("0.0.0.0"),
  port: PortSchema,
  certPath: z.string().min(1).describe("PEM certificate chain"),
  keyPath: z.string().min(1).describe("PEM private key"),
});

export const UnixListenerConfigSchema = z.object({
  transport: z.literal("unix"),
  path: z.string().min(1).describe("Socket file path, ~ is expanded"),
});

export const ListenerConfigSchema = z.discriminatedUnion("transport", [
  TcpListenerConfigSchema,
  TlsListenerConfigSchema,
  UnixListenerConfigSchema,
]);

export const ServerConfigSchema = z.object({
  listeners: z.array(ListenerConfigSchema).min(1).default(DEFAULTS.listeners),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ListenerConfig = z.infer<typeof ListenerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
