import type { ListingMatch } from "../routing/types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function urlFor(key: string): string {
  return key === "" ? "/" : `/${key.split("/").map(encodeURIComponent).join("/")}/`;
}

/** HTML index of a directory without index file. */
export function renderListing(match: ListingMatch): string {
  const key = match.directory.normalizedPath;
  const base = urlFor(key);
  const title = escapeHtml(`Index of ${key === "" ? "/" : `/${key}/`}`);

  const items: string[] = [];
  if (key !== "") {
    items.push(`<li><a href="../">../</a></li>`);
  }
  for (const entry of match.entries) {
    const suffix = entry.kind === "directory" ? "/" : "";
    const href = escapeHtml(`${base}${encodeURIComponent(entry.name)}${suffix}`);
    items.push(`<li><a href="${href}">${escapeHtml(entry.name)}${suffix}</a></li>`);
  }

  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><meta charset="utf-8"><title>${title}</title></head>`,
    "<body>",
    `<h1>${title}</h1>`,
    "<ul>",
    ...items,
    "</ul>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
