import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { notFound } from "@treeserve/core/routing";
import type { SessionCodec, SessionData } from "@treeserve/core/session";

const SessionPayloadSchema = z.record(z.string(), z.unknown());

/**
 * Generates a random 32-byte hex secret. Used when no session secret is
 * configured; sessions then do not survive a restart.
 */
export function generateSessionSecret(): string {
  return randomBytes(32).toString("hex");
}

/**
 * Signed (not encrypted) cookie sessions: `base64url(JSON).base64url(HMAC-SHA256)`.
 */
export function createHmacSessionCodec(secret: string): SessionCodec {
  function sign(payload: string): Buffer {
    return createHmac("sha256", secret).update(payload).digest();
  }

  return {
    encode(data: SessionData) {
      const payload = Buffer.from(JSON.stringify(data), "utf-8").toString("base64url");
      return `${payload}.${sign(payload).toString("base64url")}`;
    },

    decode(cookie) {
      const dot = cookie.lastIndexOf(".");
      if (dot <= 0) return notFound("session");

      const payload = cookie.slice(0, dot);
      const signature = Buffer.from(cookie.slice(dot + 1), "base64url");
      const expected = sign(payload);
      if (signature.length !== expected.length || !timingSafeEqual(signature, expected)) {
        return notFound("session");
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
      } catch {
        return notFound("session");
      }
      const result = SessionPayloadSchema.safeParse(parsed);
      return result.success ? result.data : notFound("session");
    },
  };
}
