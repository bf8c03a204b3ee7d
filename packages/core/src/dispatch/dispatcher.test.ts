import { describe, it, expect, vi, type Mock } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import {
  DynamicExecutionError,
  MethodNotAllowedError,
  NotFoundError,
  TemplateError,
} from "../errors/catalog.js";
import { createSilentLogger } from "../logger/index.js";
import { createClassifier } from "../routing/classify.js";
import { isMiss } from "../routing/miss.js";
import { createResolver } from "../routing/resolver.js";
import type { ResolvedRoute } from "../routing/types.js";
import { createSessionAccessor } from "../session/accessor.js";
import {
  createTestIndex,
  TEST_CLASSIFIER_OPTIONS,
  touch,
  withContentTree,
} from "../test-utils/content-tree.js";
import { createTestContext } from "../test-utils/request.js";
import { createDispatcher } from "./dispatcher.js";
import type { ResponseDescriptor, ScriptExecutor, TemplateRenderer } from "./types.js";

const MTIME = new Date("2024-03-01T12:00:00.000Z");

const SITE = {
  "hello.txt": "hello world",
  "static/logo.png": new Uint8Array([1, 2, 3, 4]),
  "about.tmpl": "About {{ route.path }}",
  "blog/index.tmpl": "Blog home",
  "api/users.mjs": "export function get() { return 'users' }",
  "files/readme.md": "# readme",
  "files/nested/deep.txt": "deep",
};

interface Harness {
  root: string;
  resolve(path: string, options?: { listing?: boolean }): ResolvedRoute;
  renderer: { render: Mock<TemplateRenderer["render"]> };
  executor: { execute: Mock<ScriptExecutor["execute"]> };
  dispatcher: ReturnType<typeof createDispatcher>;
}

async function withDispatcher(fn: (h: Harness) => Promise<void>): Promise<void> {
  await withContentTree(SITE, async (root) => {
    for (const path of Object.keys(SITE)) {
      await touch(join(root, path), MTIME);
    }
    const index = createTestIndex(root);
    await index.buildFull();
    const classifier = createClassifier(TEST_CLASSIFIER_OPTIONS);

    const renderer = {
      render: vi.fn<TemplateRenderer["render"]>(async () => "<p>rendered</p>"),
    };
    const executor = {
      execute: vi.fn<ScriptExecutor["execute"]>(
        async () => ({
          status: 201,
          headers: { "x-handler": "users" },
          body: "created",
        }),
      ),
    };

    await fn({
      root,
      resolve(path, options = {}) {
        const result = createResolver({
          index,
          classifier,
          directoryListing: options.listing ?? false,
        }).resolve(path);
        if (isMiss(result)) throw new Error(`unexpected miss for ${path}`);
        return result;
      },
      renderer,
      executor,
      dispatcher: createDispatcher({
        renderer,
        executor,
        logger: createSilentLogger(),
      }),
    });
  });
}

async function readBody(response: ResponseDescriptor): Promise<string> {
  return new Response(response.body).text();
}

describe("createDispatcher — static", () => {
  it("streams the file with headers derived from the descriptor", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({ path: "/hello.txt", normalizedPath: "hello.txt" }),
      );

      expect(response.status).toBe(200);
      expect(response.headers).toEqual({
        "content-type": "text/plain; charset=utf-8",
        "content-length": "11",
        "last-modified": "Fri, 01 Mar 2024 12:00:00 GMT",
      });
      expect(await readBody(response)).toBe("hello world");
    });
  });

  it("serves binary files byte for byte", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("static/logo.png"),
        createTestContext(),
      );

      expect(response.headers["content-type"]).toBe("image/png");
      const bytes = new Uint8Array(await new Response(response.body).arrayBuffer());
      expect(bytes).toEqual(new Uint8Array([1, 2, 3, 4]));
    });
  });

  it("answers 304 when the client copy is current", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({
          headers: { "if-modified-since": "Fri, 01 Mar 2024 12:00:00 GMT" },
        }),
      );

      expect(response).toEqual({
        status: 304,
        headers: { "last-modified": "Fri, 01 Mar 2024 12:00:00 GMT" },
        body: null,
      });
    });
  });

  it("serves the file when the client copy is older", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({
          headers: { "if-modified-since": "Thu, 29 Feb 2024 12:00:00 GMT" },
        }),
      );

      expect(response.status).toBe(200);
      expect(await readBody(response)).toBe("hello world");
    });
  });

  it("ignores an unparseable If-Modified-Since", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({ headers: { "if-modified-since": "yesterday-ish" } }),
      );

      expect(response.status).toBe(200);
      await readBody(response);
    });
  });

  it("sends headers without a body for HEAD", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({ method: "HEAD" }),
      );

      expect(response.status).toBe(200);
      expect(response.headers["content-length"]).toBe("11");
      expect(response.body).toBeNull();
    });
  });

  it("rejects methods other than GET and HEAD", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const error = await dispatcher
        .dispatch(resolve("hello.txt"), createTestContext({ method: "POST" }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MethodNotAllowedError);
      if (error instanceof MethodNotAllowedError) {
        expect(error.allow).toEqual(["GET", "HEAD"]);
      }
    });
  });

  it("answers 404 for a file deleted since the scan", async () => {
    await withDispatcher(async ({ root, resolve, dispatcher }) => {
      const route = resolve("hello.txt");
      await rm(join(root, "hello.txt"));

      await expect(dispatcher.dispatch(route, createTestContext())).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  it("aborts the stream with the request's signal", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const controller = new AbortController();
      const response = await dispatcher.dispatch(
        resolve("hello.txt"),
        createTestContext({ signal: controller.signal }),
      );
      controller.abort();

      await expect(readBody(response)).rejects.toThrow();
    });
  });
});

describe("createDispatcher — template", () => {
  it("renders with the request-derived data", async () => {
    await withDispatcher(async ({ root, resolve, renderer, dispatcher }) => {
      const session = createSessionAccessor({ user: "ada" });
      const response = await dispatcher.dispatch(
        resolve("about"),
        createTestContext({
          path: "/about",
          normalizedPath: "about",
          query: { lang: "en" },
          headers: { accept: "text/html" },
          session,
        }),
      );

      expect(renderer.render).toHaveBeenCalledWith(join(root, "about.tmpl"), {
        request: {
          method: "GET",
          path: "/about",
          query: { lang: "en" },
          headers: { accept: "text/html" },
        },
        route: { path: "about.tmpl", matchedSuffix: ".tmpl" },
        session: { user: "ada" },
      });
      expect(response).toEqual({
        status: 200,
        headers: {
          "content-type": "text/html; charset=utf-8",
          "content-length": "15",
        },
        body: "<p>rendered</p>",
      });
    });
  });

  it("renders a directory's template index", async () => {
    await withDispatcher(async ({ root, resolve, renderer, dispatcher }) => {
      await dispatcher.dispatch(resolve("blog"), createTestContext());

      expect(renderer.render).toHaveBeenCalledWith(
        join(root, "blog", "index.tmpl"),
        expect.objectContaining({ route: { path: "blog", matchedSuffix: "" } }),
      );
    });
  });

  it("uses the configured content type", async () => {
    await withContentTree({ "feed.tmpl": "" }, async (root) => {
      const index = createTestIndex(root);
      await index.buildFull();
      const route = createResolver({
        index,
        classifier: createClassifier(TEST_CLASSIFIER_OPTIONS),
        directoryListing: false,
      }).resolve("feed.tmpl");
      if (isMiss(route)) throw new Error("unexpected miss");

      const dispatcher = createDispatcher({
        renderer: { render: async () => "<rss/>" },
        executor: { execute: vi.fn() },
        logger: createSilentLogger(),
        contentType: "application/rss+xml",
      });
      const response = await dispatcher.dispatch(route, createTestContext());

      expect(response.headers["content-type"]).toBe("application/rss+xml");
    });
  });

  it("wraps render failures in TemplateError", async () => {
    await withDispatcher(async ({ resolve, renderer, dispatcher }) => {
      renderer.render.mockRejectedValueOnce(new Error("unknown filter 'shout'"));

      const error = await dispatcher
        .dispatch(resolve("about.tmpl"), createTestContext())
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TemplateError);
      if (error instanceof TemplateError) {
        expect(error.details).toEqual({
          path: "about.tmpl",
          reason: "unknown filter 'shout'",
        });
      }
    });
  });

  it("rejects POST to a template", async () => {
    await withDispatcher(async ({ resolve, renderer, dispatcher }) => {
      await expect(
        dispatcher.dispatch(resolve("about.tmpl"), createTestContext({ method: "POST" })),
      ).rejects.toBeInstanceOf(MethodNotAllowedError);
      expect(renderer.render).not.toHaveBeenCalled();
    });
  });
});

describe("createDispatcher — dynamic", () => {
  it("returns the executor's response descriptor", async () => {
    await withDispatcher(async ({ root, resolve, executor, dispatcher }) => {
      const context = createTestContext({ method: "POST", normalizedPath: "api/users" });
      const response = await dispatcher.dispatch(resolve("api/users"), context);

      expect(executor.execute).toHaveBeenCalledWith(
        join(root, "api", "users.mjs"),
        context,
        context.session,
      );
      expect(response).toEqual({
        status: 201,
        headers: { "x-handler": "users" },
        body: "created",
      });
    });
  });

  it("passes catalog errors raised by the script through", async () => {
    await withDispatcher(async ({ resolve, executor, dispatcher }) => {
      executor.execute.mockRejectedValueOnce(new NotFoundError({ path: "api/users/7" }));

      await expect(
        dispatcher.dispatch(resolve("api/users.mjs"), createTestContext()),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it("maps any other failure to DynamicExecutionError", async () => {
    await withDispatcher(async ({ resolve, executor, dispatcher }) => {
      executor.execute.mockRejectedValueOnce(new TypeError("users is not iterable"));

      const error = await dispatcher
        .dispatch(resolve("api/users.mjs"), createTestContext())
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DynamicExecutionError);
      if (error instanceof DynamicExecutionError) {
        expect(error.code).toBe(500);
        expect(error.details).toEqual({
          path: "api/users.mjs",
          reason: "users is not iterable",
        });
      }
    });
  });
});

describe("createDispatcher — listing", () => {
  it("renders an HTML listing", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("files", { listing: true }),
        createTestContext(),
      );

      expect(response.status).toBe(200);
      expect(response.headers["content-type"]).toBe("text/html; charset=utf-8");
      expect(typeof response.body).toBe("string");
      expect(response.body).toContain(`<a href="/files/nested/">nested/</a>`);
      expect(response.body).toContain(`<a href="/files/readme.md">readme.md</a>`);
    });
  });

  it("omits the listing body for HEAD", async () => {
    await withDispatcher(async ({ resolve, dispatcher }) => {
      const response = await dispatcher.dispatch(
        resolve("files", { listing: true }),
        createTestContext({ method: "HEAD" }),
      );

      expect(response.body).toBeNull();
      expect(Number(response.headers["content-length"])).toBeGreaterThan(0);
    });
  });
});
