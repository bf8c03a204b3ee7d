import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8080,
    host: "127.0.0.1",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  content: {
    root: "site",
    indexPattern: "index.*",
    directoryListing: false,
    hiddenPrefixes: [".", "_"],
  },
  extensions: {
    kinds: {
      ".tmpl": "template" as const,
      ".njk": "template" as const,
      ".mjs": "dynamic" as const,
    },
    priority: [".mjs", ".tmpl", ".njk", ".html"],
  },
  templates: {
    contentType: "text/html; charset=utf-8",
  },
  watch: {
    enabled: true,
    debounceMs: 100,
    revalidateIntervalMs: 0,
  },
  session: {
    cookieName: "treeserve.sid",
    maxAgeSeconds: 86_400,
  },
  packets: {
    enabled: true,
    root: "packets",
    endpoint: "/ws",
  },
};

/** A leading dot and a single extension segment: ".tmpl", ".mjs". */
export const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, "Extension must look like .ext")
  .transform((ext) => ext.toLowerCase());

export const HandlerKindSchema = z.enum(["template", "dynamic"]);

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      host: z.string().min(1).default(DEFAULTS.server.host),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  content: z
    .object({
      root: z
        .string()
        .min(1)
        .default(DEFAULTS.content.root)
        .describe("Content root, relative to the project root"),
      indexPattern: z
        .string()
        .min(1)
        .refine((p) => !p.includes("/"), "Index pattern matches file names only")
        .default(DEFAULTS.content.indexPattern),
      directoryListing: z.boolean().default(DEFAULTS.content.directoryListing),
      hiddenPrefixes: z
        .array(z.string().min(1))
        .default(DEFAULTS.content.hiddenPrefixes),
    })
    .default(DEFAULTS.content),
  extensions: z
    .object({
      kinds: z
        .record(ExtensionSchema, HandlerKindSchema)
        .default(DEFAULTS.extensions.kinds),
      priority: z
        .array(ExtensionSchema)
        .refine(
          (list) => new Set(list).size === list.length,
          "Extension priority list has duplicates",
        )
        .default(DEFAULTS.extensions.priority),
    })
    .default(DEFAULTS.extensions),
  templates: z
    .object({
      contentType: z.string().min(1).default(DEFAULTS.templates.contentType),
    })
    .default(DEFAULTS.templates),
  watch: z
    .object({
      enabled: z.boolean().default(DEFAULTS.watch.enabled),
      debounceMs: z.number().int().min(0).default(DEFAULTS.watch.debounceMs),
      revalidateIntervalMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.watch.revalidateIntervalMs)
        .describe("Periodic full rescan; 0 disables it"),
    })
    .default(DEFAULTS.watch),
  session: z
    .object({
      cookieName: z.string().min(1).default(DEFAULTS.session.cookieName),
      secret: z
        .string()
        .min(16)
        .optional()
        .describe("Cookie signing secret; a random one is generated when unset"),
      maxAgeSeconds: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.session.maxAgeSeconds),
    })
    .default(DEFAULTS.session),
  packets: z
    .object({
      enabled: z.boolean().default(DEFAULTS.packets.enabled),
      root: z
        .string()
        .min(1)
        .default(DEFAULTS.packets.root)
        .describe("Packet modules, relative to the project root"),
      endpoint: z
        .string()
        .regex(/^\/[^?#]*$/, "Endpoint must be a path starting with /")
        .default(DEFAULTS.packets.endpoint),
    })
    .default(DEFAULTS.packets),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type ContentConfig = ServerConfig["content"];
export type ExtensionsConfig = ServerConfig["extensions"];
export type PacketsConfig = ServerConfig["packets"];
export type HandlerKind = z.infer<typeof HandlerKindSchema>;
