import type { Logger } from "pino";
import { z } from "zod";
import { isMiss } from "../routing/miss.js";
import type { RouteIndex } from "../routing/route-index.js";
import type { RouteSnapshot } from "../routing/snapshot.js";
import { packetName } from "./naming.js";
import type {
  ArgumentSchema,
  PacketDefinition,
  PacketHandler,
  PacketModuleLoader,
} from "./types.js";

function isHandler(value: unknown): value is PacketHandler {
  return typeof value === "function";
}

function isArgumentSchema(value: unknown): value is ArgumentSchema {
  return (
    typeof value === "object" &&
    value !== null &&
    "safeParse" in value &&
    typeof value.safeParse === "function"
  );
}

/** `export const join = { args: z.object(...), handler: async (args) => ... }` */
const PacketExportSchema = z.object({
  args: z.custom<ArgumentSchema>(isArgumentSchema, "args must have safeParse").optional(),
  handler: z.custom<PacketHandler>(isHandler, "handler must be a function"),
});

/**
 * Packets exported by one module. Functions and `{ args?, handler }`
 * objects are packets; `default` and names starting with "_" are not.
 */
export function packetsFromModule(
  key: string,
  mod: Record<string, unknown>,
): PacketDefinition[] {
  const packets: PacketDefinition[] = [];
  for (const [exportName, value] of Object.entries(mod)) {
    if (exportName === "default" || exportName.startsWith("_")) continue;

    const name = packetName(key, exportName);
    if (isHandler(value)) {
      packets.push({ name, sourceKey: key, handler: value });
      continue;
    }
    const parsed = PacketExportSchema.safeParse(value);
    if (parsed.success) {
      packets.push({ name, sourceKey: key, ...parsed.data });
    }
  }
  return packets;
}

export interface PacketRegistryDeps {
  index: Pick<RouteIndex, "snapshot">;
  loader: PacketModuleLoader;
  logger: Logger;
}

export interface PacketRegistry {
  /** Packet by dotted name, from modules as of the current snapshot. */
  lookup(name: string): Promise<PacketDefinition | undefined>;
  names(): Promise<string[]>;
}

/**
 * Packets of every dynamic module in the packet index. The table is
 * rebuilt the first time it is read after the index publishes a new
 * snapshot.
 */
export function createPacketRegistry(deps: PacketRegistryDeps): PacketRegistry {
  const { index, loader, logger } = deps;

  let loaded: { version: number; packets: Map<string, PacketDefinition> } | null = null;
  let inFlight: { version: number; promise: Promise<Map<string, PacketDefinition>> } | null =
    null;

  async function build(snapshot: RouteSnapshot): Promise<Map<string, PacketDefinition>> {
    const packets = new Map<string, PacketDefinition>();
    for (const key of snapshot.routeKeys().sort()) {
      const descriptor = snapshot.lookup(key);
      if (isMiss(descriptor) || descriptor.kind !== "dynamic") continue;

      let mod: Record<string, unknown>;
      try {
        mod = await loader.load(descriptor.absoluteFilePath);
      } catch (err) {
        logger.warn({ err, path: key }, "Skipping packet module that failed to load");
        continue;
      }

      for (const packet of packetsFromModule(key, mod)) {
        const existing = packets.get(packet.name);
        if (existing) {
          logger.warn(
            { packet: packet.name, kept: existing.sourceKey, skipped: key },
            "Duplicate packet name",
          );
          continue;
        }
        packets.set(packet.name, packet);
      }
    }
    logger.debug({ version: snapshot.version, packets: packets.size }, "Packet table built");
    return packets;
  }

  function current(): Promise<Map<string, PacketDefinition>> {
    const snapshot = index.snapshot();
    if (loaded && loaded.version === snapshot.version) {
      return Promise.resolve(loaded.packets);
    }
    if (inFlight && inFlight.version === snapshot.version) {
      return inFlight.promise;
    }

    const version = snapshot.version;
    const promise = build(snapshot).then((packets) => {
      if (!loaded || loaded.version < version) {
        loaded = { version, packets };
      }
      return packets;
    });
    inFlight = { version, promise };
    return promise;
  }

  return {
    async lookup(name) {
      return (await current()).get(name);
    },
    async names() {
      return [...(await current()).keys()].sort();
    },
  };
}
