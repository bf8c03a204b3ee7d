import { MethodNotAllowedError } from "../errors/catalog.js";

export const READ_METHODS: readonly string[] = ["GET", "HEAD"];

export function assertReadMethod(method: string, path: string): void {
  if (!READ_METHODS.includes(method)) {
    throw new MethodNotAllowedError({ path, method, allow: [...READ_METHODS] });
  }
}
