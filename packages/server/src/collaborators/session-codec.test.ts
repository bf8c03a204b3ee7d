import { describe, it, expect } from "vitest";
import { createHmac } from "node:crypto";
import { isMiss } from "@treeserve/core/routing";
import { createHmacSessionCodec, generateSessionSecret } from "./session-codec.js";

const SECRET = "test-secret-for-sessions";
const codec = createHmacSessionCodec(SECRET);

/** Signs raw payload text the way the codec signs serialized sessions. */
function signRaw(raw: string): string {
  const payload = Buffer.from(raw, "utf-8").toString("base64url");
  const signature = createHmac("sha256", SECRET).update(payload).digest("base64url");
  return `${payload}.${signature}`;
}

describe("createHmacSessionCodec", () => {
  it("decodes what it encodes", () => {
    const cookie = codec.encode({ user: "ada", visits: 3, roles: ["editor"] });

    expect(codec.decode(cookie)).toEqual({ user: "ada", visits: 3, roles: ["editor"] });
  });

  it("produces a payload and a signature separated by a dot", () => {
    const cookie = codec.encode({ a: 1 });

    expect(cookie).toBe(signRaw('{"a":1}'));
  });

  it("rejects a tampered payload", () => {
    const cookie = codec.encode({ user: "ada" });
    const signature = cookie.slice(cookie.indexOf(".") + 1);
    const forged = `${Buffer.from('{"user":"root"}').toString("base64url")}.${signature}`;

    expect(codec.decode(forged)).toEqual({
      type: "miss",
      reason: "not-found",
      path: "session",
    });
  });

  it("rejects a cookie signed with another secret", () => {
    const other = createHmacSessionCodec("another-test-secret");

    expect(isMiss(codec.decode(other.encode({ user: "ada" })))).toBe(true);
  });

  it.each(["", "no-dot-here", ".onlysignature", "abc.", "!!!.???"])(
    "rejects malformed cookie %j",
    (cookie) => {
      expect(isMiss(codec.decode(cookie))).toBe(true);
    },
  );

  it.each(["[1,2,3]", '"just a string"', "null", "not json"])(
    "rejects a signed payload that is not a JSON object: %s",
    (raw) => {
      expect(isMiss(codec.decode(signRaw(raw)))).toBe(true);
    },
  );
});

describe("generateSessionSecret", () => {
  it("returns 64 hex characters, different each time", () => {
    const a = generateSessionSecret();
    const b = generateSessionSecret();

    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(a).not.toBe(b);
  });
});
