import { relative, sep } from "node:path";
import nunjucks from "nunjucks";
import type { TemplateRenderer } from "@treeserve/core/dispatch";

export interface NunjucksRendererOptions {
  /** Content root; includes and extends resolve against it. */
  root: string;
  autoescape?: boolean;
}

export function createNunjucksRenderer(options: NunjucksRendererOptions): TemplateRenderer {
  // noCache: edits show up on the next request, same as the route index
  const env = new nunjucks.Environment(
    new nunjucks.FileSystemLoader(options.root, { noCache: true }),
    { autoescape: options.autoescape ?? true },
  );

  return {
    render(filePath, data) {
      const name = relative(options.root, filePath).split(sep).join("/");
      return new Promise((resolve, reject) => {
        env.render(name, data, (err, result) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(result ?? "");
        });
      });
    },
  };
}
